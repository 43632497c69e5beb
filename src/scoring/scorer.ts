import {
    EntityType,
    RelationType,
    type CoreferenceAlignment,
    type CoreferenceCounts,
    type Counts,
    type Document,
    type DocumentAlignment,
    type Entity,
    type EvaluationConfig,
    type LinkingCounts,
    type ScoreRecord,
} from '../types/index.js';

type MutableCounts = { tp: number; fp: number; fn: number };

function zeroCounts(types: readonly string[]): Record<string, MutableCounts> {
    const counts: Record<string, MutableCounts> = {};
    for (const type of types) counts[type] = { tp: 0, fp: 0, fn: 0 };
    return counts;
}

function bump(counts: Record<string, MutableCounts>, type: string, field: keyof MutableCounts): void {
    const entry = counts[type] ?? { tp: 0, fp: 0, fn: 0 };
    entry[field] += 1;
    counts[type] = entry;
}

/**
 * TP per predicted item aligned, FP per predicted item unaligned, FN per gold item unaligned.
 */
function countByType(
    gold: readonly { id: string; type: string }[],
    predicted: readonly { id: string; type: string }[],
    alignment: ReadonlyMap<string, string>,
    types: readonly string[]
): Record<string, Counts> {
    const counts = zeroCounts(types);
    const alignedGold = new Set(alignment.values());

    for (const item of predicted) {
        bump(counts, item.type, alignment.has(item.id) ? 'tp' : 'fp');
    }
    for (const item of gold) {
        if (!alignedGold.has(item.id)) bump(counts, item.type, 'fn');
    }

    return counts;
}

function linkKey(predictedCluster: string, goldCluster: string): string {
    return `${predictedCluster}\u0000${goldCluster}`;
}

/**
 * B-cubed over all entities, with unchained entities as singleton clusters.
 *
 * Each predicted entity contributes shared(P, G) / |P|, where P is its
 * cluster and G the cluster of its aligned gold entity (0 when unaligned
 * or when the cluster link is below the configured minimum). Recall is the
 * mirror image over gold entities.
 */
function bCubedCounts(gold: Document, predicted: Document, alignment: DocumentAlignment): CoreferenceCounts {
    const coreference = alignment.coreference;
    const shared = new Map(coreference.links.map((link) => [linkKey(link.predictedCluster, link.goldCluster), link.sharedPairs]));

    const sharedFor = (predictedId: string, goldId: string): number => {
        const predictedCluster = coreference.predictedClusterOf.get(predictedId);
        const goldCluster = coreference.goldClusterOf.get(goldId);
        if (predictedCluster === undefined || goldCluster === undefined) return 0;
        return shared.get(linkKey(predictedCluster, goldCluster)) ?? 0;
    };

    const sizeOf = (clusters: CoreferenceAlignment['predictedClusters'], clusterOf: ReadonlyMap<string, string>, id: string): number => {
        const clusterId = clusterOf.get(id);
        return (clusterId === undefined ? undefined : clusters.get(clusterId)?.entityIds.length) ?? 1;
    };

    let precisionNumerator = 0;
    for (const entity of predicted.entities) {
        const goldId = alignment.entities.get(entity.id);
        if (goldId === undefined) continue;
        precisionNumerator +=
            sharedFor(entity.id, goldId) / sizeOf(coreference.predictedClusters, coreference.predictedClusterOf, entity.id);
    }

    const predictedFor = new Map([...alignment.entities].map(([predictedId, goldId]) => [goldId, predictedId]));
    let recallNumerator = 0;
    for (const entity of gold.entities) {
        const predictedId = predictedFor.get(entity.id);
        if (predictedId === undefined) continue;
        recallNumerator +=
            sharedFor(predictedId, entity.id) / sizeOf(coreference.goldClusters, coreference.goldClusterOf, entity.id);
    }

    return {
        precisionNumerator,
        precisionDenominator: predicted.entities.length,
        recallNumerator,
        recallDenominator: gold.entities.length,
    };
}

/**
 * Exact chain matching over explicit chains: a predicted chain matches a
 * gold chain when every member of each is aligned into the other.
 */
function exactChainCounts(alignment: DocumentAlignment): CoreferenceCounts {
    const { predictedClusters, goldClusters, links } = alignment.coreference;
    const explicitPredicted = [...predictedClusters.values()].filter((cluster) => cluster.explicit);
    const explicitGold = [...goldClusters.values()].filter((cluster) => cluster.explicit);

    let matched = 0;
    for (const link of links) {
        const p = predictedClusters.get(link.predictedCluster);
        const g = goldClusters.get(link.goldCluster);
        if (!p?.explicit || !g?.explicit) continue;
        if (link.sharedPairs === p.entityIds.length && link.sharedPairs === g.entityIds.length) matched++;
    }

    return {
        precisionNumerator: matched,
        precisionDenominator: explicitPredicted.length,
        recallNumerator: matched,
        recallDenominator: explicitGold.length,
    };
}

function sameLink(gold: Entity, predicted: Entity, caseSensitive: boolean): boolean {
    if (!gold.link || !predicted.link) return false;
    if (gold.link.authority !== predicted.link.authority) return false;
    return caseSensitive
        ? gold.link.code === predicted.link.code
        : gold.link.code.toLowerCase() === predicted.link.code.toLowerCase();
}

/**
 * Linking accuracy inputs: aligned pairs whose gold entity carries a link.
 * Independent of the detection counts, which stay TP for a wrong link.
 */
function linkingCounts(gold: Document, predicted: Document, alignment: DocumentAlignment, caseSensitive: boolean): LinkingCounts {
    const goldById = new Map(gold.entities.map((entity) => [entity.id, entity]));
    const predictedById = new Map(predicted.entities.map((entity) => [entity.id, entity]));

    let correct = 0;
    let total = 0;
    for (const pair of alignment.entityPairs) {
        const g = goldById.get(pair.goldId);
        const p = predictedById.get(pair.predictedId);
        if (!g?.link || !p) continue;
        total++;
        if (sameLink(g, p, caseSensitive)) correct++;
    }

    return { correct, total };
}

/**
 * Turn one document alignment into counts.
 * Every closed-set type tag appears in the per-type records, zero or not.
 */
export function scoreDocument(
    gold: Document,
    predicted: Document,
    alignment: DocumentAlignment,
    config: EvaluationConfig
): ScoreRecord {
    return {
        entities: countByType(gold.entities, predicted.entities, alignment.entities, Object.values(EntityType)),
        relations: countByType(gold.relations, predicted.relations, alignment.relations, Object.values(RelationType)),
        coreference: config.corefPartialCredit ? bCubedCounts(gold, predicted, alignment) : exactChainCounts(alignment),
        linking: linkingCounts(gold, predicted, alignment, config.linkingCaseSensitive),
        modalityMismatches: alignment.modalityMismatches.length,
    };
}
