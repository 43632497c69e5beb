import {
    Modality,
    type CoreferenceChain,
    type Document,
    type Entity,
    type EntityType,
    type LinkingIdentifier,
    type Relation,
    type RelationArgument,
    type RelationType,
} from '../types/index.js';

export function entity(id: string, type: EntityType, start: number, end: number, link?: LinkingIdentifier): Entity {
    return link ? { id, type, span: { start, end }, link } : { id, type, span: { start, end } };
}

/**
 * `args` maps role → id; ids starting with R are relation refs.
 */
export function relation(
    id: string,
    type: RelationType,
    args: Record<string, string>,
    modality: Modality = Modality.Asserted
): Relation {
    return {
        id,
        type,
        modality,
        arguments: Object.entries(args).map(([role, ref]): RelationArgument => ({
            role,
            ref: { kind: ref.startsWith('R') ? 'relation' : 'entity', id: ref },
        })),
    };
}

export function doc(
    id: string,
    parts: {
        entities?: readonly Entity[];
        relations?: readonly Relation[];
        chains?: readonly CoreferenceChain[];
        text?: string;
    } = {}
): Document {
    return {
        id,
        text: parts.text ?? 'x'.repeat(100),
        entities: parts.entities ?? [],
        chains: parts.chains ?? [],
        relations: parts.relations ?? [],
    };
}
