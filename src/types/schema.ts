/**
 * Entity types annotated in the phytosanitary corpus.
 */
export enum EntityType {
    Organism = 'Organism',
    Pest = 'Pest',
    Plant = 'Plant',
    Vector = 'Vector',
    Disease = 'Disease',
    Location = 'Location',
    Habitat = 'Habitat',
    Date = 'Date',
    Organization = 'Organization',
}

/**
 * Relation types. Relations may take other relations as arguments
 * (e.g. an Organization `Reports` a `Transmits` event).
 */
export enum RelationType {
    Causes = 'Causes',
    Affects = 'Affects',
    Transmits = 'Transmits',
    HasBeenFoundOn = 'HasBeenFoundOn',
    LocatedIn = 'LocatedIn',
    OccursOn = 'OccursOn',
    Reports = 'Reports',
}

/**
 * Whether a relation is stated as fact, denied, or only suggested in the text.
 */
export enum Modality {
    Asserted = 'Asserted',
    Negated = 'Negated',
    Hypothetical = 'Hypothetical',
    Uncertain = 'Uncertain',
}

/** External authorities that entity linking identifiers come from */
export type LinkAuthority = 'NCBI_Taxonomy' | 'GeoNames' | 'OntoBiotope';

export const LINK_AUTHORITIES: readonly LinkAuthority[] = ['NCBI_Taxonomy', 'GeoNames', 'OntoBiotope'];

/** What a relation role may point at */
export type ArgumentKind = 'entity' | 'relation';

/**
 * One role slot of a relation type.
 */
export interface RoleSpec {
    name: string;
    accepts: ArgumentKind | 'any';
    required: boolean;
    /** Whether the role label may occur more than once in one relation */
    repeatable: boolean;
}

/**
 * Per-relation-type role tables. The first two roles of each type
 * are also the positional `source` / `target` of binary model outputs.
 */
export const RELATION_SCHEMA: Readonly<Record<RelationType, readonly RoleSpec[]>> = {
    [RelationType.Causes]: [
        { name: 'agent', accepts: 'entity', required: true, repeatable: false },
        { name: 'effect', accepts: 'entity', required: true, repeatable: false },
    ],
    [RelationType.Affects]: [
        { name: 'agent', accepts: 'entity', required: true, repeatable: false },
        { name: 'target', accepts: 'entity', required: true, repeatable: false },
    ],
    [RelationType.Transmits]: [
        { name: 'agent', accepts: 'entity', required: true, repeatable: false },
        { name: 'host', accepts: 'entity', required: true, repeatable: false },
        { name: 'pathogen', accepts: 'entity', required: false, repeatable: false },
    ],
    [RelationType.HasBeenFoundOn]: [
        { name: 'agent', accepts: 'entity', required: true, repeatable: false },
        { name: 'host', accepts: 'entity', required: true, repeatable: false },
    ],
    [RelationType.LocatedIn]: [
        { name: 'subject', accepts: 'any', required: true, repeatable: false },
        { name: 'location', accepts: 'entity', required: true, repeatable: true },
    ],
    [RelationType.OccursOn]: [
        { name: 'event', accepts: 'relation', required: true, repeatable: false },
        { name: 'date', accepts: 'entity', required: true, repeatable: false },
    ],
    [RelationType.Reports]: [
        { name: 'reporter', accepts: 'entity', required: true, repeatable: false },
        { name: 'event', accepts: 'relation', required: true, repeatable: true },
    ],
};

const ENTITY_TYPES: ReadonlySet<string> = new Set(Object.values(EntityType));
const RELATION_TYPES: ReadonlySet<string> = new Set(Object.values(RelationType));
const MODALITIES: ReadonlySet<string> = new Set(Object.values(Modality));
const AUTHORITIES: ReadonlySet<string> = new Set(LINK_AUTHORITIES);

export function isEntityType(value: string): value is EntityType {
    return ENTITY_TYPES.has(value);
}

export function isRelationType(value: string): value is RelationType {
    return RELATION_TYPES.has(value);
}

export function isModality(value: string): value is Modality {
    return MODALITIES.has(value);
}

export function isLinkAuthority(value: string): value is LinkAuthority {
    return AUTHORITIES.has(value);
}
