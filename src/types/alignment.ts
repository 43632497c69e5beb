/**
 * An aligned (predicted, gold) entity pair with its span overlap.
 */
export interface EntityPair {
    predictedId: string;
    goldId: string;
    overlap: number;
}

export interface RelationPair {
    predictedId: string;
    goldId: string;
}

/**
 * A coreference cluster: an explicit chain, or the implicit singleton
 * of an entity that belongs to no chain.
 */
export interface Cluster {
    id: string;
    entityIds: readonly string[];
    /** False for implicit singletons */
    explicit: boolean;
}

/**
 * Raw count of aligned entity pairs that fall inside both a predicted
 * and a gold cluster. Only links reaching the configured minimum are kept.
 */
export interface ClusterLink {
    predictedCluster: string;
    goldCluster: string;
    sharedPairs: number;
}

export interface CoreferenceAlignment {
    predictedClusters: ReadonlyMap<string, Cluster>;
    goldClusters: ReadonlyMap<string, Cluster>;
    /** entity id → cluster id */
    predictedClusterOf: ReadonlyMap<string, string>;
    goldClusterOf: ReadonlyMap<string, string>;
    links: readonly ClusterLink[];
}

/**
 * A predicted relation that would have matched a gold relation
 * except for its modality. Diagnostic only; both stay unmatched.
 */
export interface ModalityMismatch {
    predictedId: string;
    goldId: string;
}

/**
 * One-to-one alignment of one predicted document against its gold document.
 * Ids absent from the maps are unmatched.
 */
export interface DocumentAlignment {
    documentId: string;
    /** predicted entity id → gold entity id */
    entities: ReadonlyMap<string, string>;
    entityPairs: readonly EntityPair[];
    /** predicted relation id → gold relation id */
    relations: ReadonlyMap<string, string>;
    relationPairs: readonly RelationPair[];
    coreference: CoreferenceAlignment;
    modalityMismatches: readonly ModalityMismatch[];
}
