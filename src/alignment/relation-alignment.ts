import type { ArgumentRef, ModalityMismatch, Relation, RelationPair } from '../types/index.js';
import { orderRelations } from '../graph/relation-order.js';
import { compareIds } from '../utils/ids.js';

export interface RelationAlignment {
    relations: Map<string, string>;
    pairs: RelationPair[];
    modalityMismatches: ModalityMismatch[];
}

/**
 * Canonical argument signature: roles sorted, argument refs sorted within a role.
 * Undefined when some argument cannot be translated.
 */
function signature(relation: Relation, translate: (ref: ArgumentRef) => string | undefined): string | undefined {
    const byRole = new Map<string, string[]>();

    for (const argument of relation.arguments) {
        const id = translate(argument.ref);
        if (id === undefined) return undefined;
        const refs = byRole.get(argument.role) ?? [];
        refs.push(`${argument.ref.kind}:${id}`);
        byRole.set(argument.role, refs);
    }

    return [...byRole.entries()]
        .sort(([a], [b]) => compareIds(a, b))
        .map(([role, refs]) => `${role}=${refs.sort(compareIds).join(',')}`)
        .join(';');
}

/**
 * Second-pass relation alignment, run after entity alignment.
 *
 * Predicted relations are visited innermost first, so a nested argument is
 * already resolved when its parent is examined. A predicted relation matches
 * the free gold relation (smallest id first) of the same type whose arguments
 * are exactly the aligned counterparts of its own, with equal modality.
 * Relations on a nesting cycle are never matched.
 */
export function alignRelations(
    gold: readonly Relation[],
    predicted: readonly Relation[],
    entityMap: ReadonlyMap<string, string>
): RelationAlignment {
    const relations = new Map<string, string>();
    const pairs: RelationPair[] = [];
    const modalityMismatches: ModalityMismatch[] = [];

    const goldSignatures = new Map<string, string | undefined>();
    const goldByType = new Map<string, Relation[]>();
    for (const relation of [...gold].sort((a, b) => compareIds(a.id, b.id))) {
        goldSignatures.set(relation.id, signature(relation, (ref) => ref.id));
        const group = goldByType.get(relation.type) ?? [];
        group.push(relation);
        goldByType.set(relation.type, group);
    }

    const predictedById = new Map(predicted.map((relation) => [relation.id, relation]));
    const matchedGold = new Set<string>();

    const translate = (ref: ArgumentRef): string | undefined =>
        ref.kind === 'entity' ? entityMap.get(ref.id) : relations.get(ref.id);

    for (const id of orderRelations(predicted).order) {
        const relation = predictedById.get(id);
        if (!relation) continue;

        const mapped = signature(relation, translate);
        if (mapped === undefined) continue;

        const candidates = (goldByType.get(relation.type) ?? []).filter(
            (candidate) => !matchedGold.has(candidate.id) && goldSignatures.get(candidate.id) === mapped
        );

        const match = candidates.find((candidate) => candidate.modality === relation.modality);
        if (match) {
            matchedGold.add(match.id);
            relations.set(relation.id, match.id);
            pairs.push({ predictedId: relation.id, goldId: match.id });
            continue;
        }

        const near = candidates[0];
        if (near) {
            modalityMismatches.push({ predictedId: relation.id, goldId: near.id });
        }
    }

    pairs.sort((a, b) => compareIds(a.predictedId, b.predictedId));
    return { relations, pairs, modalityMismatches };
}
