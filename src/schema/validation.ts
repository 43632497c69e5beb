import {
    RELATION_SCHEMA,
    isEntityType,
    isLinkAuthority,
    isModality,
    isRelationType,
    type CoreferenceChain,
    type Entity,
    type Relation,
    type RelationArgument,
    type Span,
} from '../types/index.js';

/**
 * Names of the schema rules a candidate can violate.
 */
export type ValidationRule =
    | 'SpanOrder'
    | 'SpanBounds'
    | 'UnknownEntityType'
    | 'UnknownRelationType'
    | 'UnknownModality'
    | 'UnknownAuthority'
    | 'EmptyLinkCode'
    | 'UnknownRole'
    | 'DuplicateRole'
    | 'MissingRole'
    | 'ArgumentKind'
    | 'EmptyChain'
    | 'DuplicateChainId'
    | 'OverlappingChains'
    | 'UnknownChainMember';

export interface ValidationFailure {
    rule: ValidationRule;
    itemId: string;
    message: string;
}

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; failure: ValidationFailure };

/**
 * Entity before its type tags are checked.
 */
export interface EntityCandidate {
    id: string;
    type: string;
    span: Span;
    text?: string;
    link?: { authority: string; code: string };
}

/**
 * Relation before its type tags are checked. Argument kinds are already resolved.
 */
export interface RelationCandidate {
    id: string;
    type: string;
    arguments: readonly RelationArgument[];
    modality: string;
}

function fail<T>(rule: ValidationRule, itemId: string, message: string): ValidationResult<T> {
    return { ok: false, failure: { rule, itemId, message } };
}

/**
 * Check an entity's type tag, span bounds and linking identifier.
 */
export function validateEntity(candidate: EntityCandidate, textLength: number): ValidationResult<Entity> {
    const { id, type, span, link } = candidate;

    if (!isEntityType(type)) {
        return fail('UnknownEntityType', id, `Unknown entity type "${type}"`);
    }
    if (!Number.isInteger(span.start) || !Number.isInteger(span.end) || span.start >= span.end) {
        return fail('SpanOrder', id, `Span [${span.start}, ${span.end}) is empty or inverted`);
    }
    if (span.start < 0 || span.end > textLength) {
        return fail('SpanBounds', id, `Span [${span.start}, ${span.end}) exceeds text length ${textLength}`);
    }

    if (!link) {
        return { ok: true, value: { id, type, span, text: candidate.text } };
    }

    if (!isLinkAuthority(link.authority)) {
        return fail('UnknownAuthority', id, `Unknown linking authority "${link.authority}"`);
    }
    if (link.code.trim() === '') {
        return fail('EmptyLinkCode', id, 'Linking identifier is empty');
    }

    return {
        ok: true,
        value: { id, type, span, text: candidate.text, link: { authority: link.authority, code: link.code } },
    };
}

/**
 * Check a relation's type, modality and role cardinality against RELATION_SCHEMA.
 */
export function validateRelation(candidate: RelationCandidate): ValidationResult<Relation> {
    const { id, type, modality } = candidate;

    if (!isRelationType(type)) {
        return fail('UnknownRelationType', id, `Unknown relation type "${type}"`);
    }
    if (!isModality(modality)) {
        return fail('UnknownModality', id, `Unknown modality "${modality}"`);
    }

    const roles = RELATION_SCHEMA[type];
    const seen = new Map<string, number>();

    for (const argument of candidate.arguments) {
        const spec = roles.find((role) => role.name === argument.role);
        if (!spec) {
            return fail('UnknownRole', id, `Role "${argument.role}" is not defined for ${type}`);
        }
        if (spec.accepts !== 'any' && spec.accepts !== argument.ref.kind) {
            return fail(
                'ArgumentKind',
                id,
                `Role "${argument.role}" of ${type} takes a ${spec.accepts}, got ${argument.ref.kind} ${argument.ref.id}`
            );
        }

        const count = (seen.get(argument.role) ?? 0) + 1;
        if (count > 1 && !spec.repeatable) {
            return fail('DuplicateRole', id, `Role "${argument.role}" occurs more than once in ${type}`);
        }
        seen.set(argument.role, count);
    }

    const missing = roles.find((role) => role.required && !seen.has(role.name));
    if (missing) {
        return fail('MissingRole', id, `Required role "${missing.name}" of ${type} is missing`);
    }

    return { ok: true, value: { id, type, arguments: candidate.arguments, modality } };
}

/**
 * Chains must be non-empty, have distinct ids, reference known entities
 * and be pairwise disjoint.
 */
export function validateChains(
    chains: readonly CoreferenceChain[],
    entityIds: ReadonlySet<string>
): ValidationResult<readonly CoreferenceChain[]> {
    const owner = new Map<string, string>();
    const chainIds = new Set<string>();

    for (const chain of chains) {
        if (chain.entityIds.length === 0) {
            return fail('EmptyChain', chain.id, `Chain ${chain.id} has no members`);
        }
        if (chainIds.has(chain.id)) {
            return fail('DuplicateChainId', chain.id, `Chain id ${chain.id} is used more than once`);
        }
        chainIds.add(chain.id);
        for (const entityId of chain.entityIds) {
            if (!entityIds.has(entityId)) {
                return fail('UnknownChainMember', chain.id, `Chain ${chain.id} references unknown entity ${entityId}`);
            }
            const previous = owner.get(entityId);
            if (previous !== undefined) {
                return fail(
                    'OverlappingChains',
                    chain.id,
                    `Entity ${entityId} belongs to both ${previous} and ${chain.id}`
                );
            }
            owner.set(entityId, chain.id);
        }
    }

    return { ok: true, value: chains };
}
