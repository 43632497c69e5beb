import type { ArgumentKind, EntityType, LinkAuthority, Modality, RelationType } from './schema.js';

/**
 * Half-open character range [start, end) into the document text.
 */
export interface Span {
    readonly start: number;
    readonly end: number;
}

/**
 * External-authority code attached to an entity (e.g. NCBI_Taxonomy 9606).
 */
export interface LinkingIdentifier {
    readonly authority: LinkAuthority;
    readonly code: string;
}

export interface Entity {
    /** Unique within the document (shared namespace with relation ids) */
    readonly id: string;
    readonly type: EntityType;
    readonly span: Span;
    /** Covered substring of the document text */
    readonly text?: string;
    /** Absent when the mention is unlinked */
    readonly link?: LinkingIdentifier;
}

/**
 * Entities referring to the same real-world referent.
 * Chains of one document never share an entity.
 */
export interface CoreferenceChain {
    readonly id: string;
    readonly entityIds: readonly string[];
}

export interface ArgumentRef {
    readonly kind: ArgumentKind;
    readonly id: string;
}

export interface RelationArgument {
    readonly role: string;
    readonly ref: ArgumentRef;
}

export interface Relation {
    readonly id: string;
    readonly type: RelationType;
    readonly arguments: readonly RelationArgument[];
    readonly modality: Modality;
}

/**
 * A fully loaded and validated annotated document. Never mutated after loading.
 */
export interface Document {
    readonly id: string;
    readonly text: string;
    readonly entities: readonly Entity[];
    readonly chains: readonly CoreferenceChain[];
    readonly relations: readonly Relation[];
}
