import type { Entity, EntityPair, MatchingStrategy } from '../types/index.js';
import { compareIds } from '../utils/ids.js';
import { greedyMatch, optimalMatch, type WeightedPair } from './matching.js';
import { spanIoU } from './spans.js';

/**
 * Eligible (predicted, gold) pairs: same type tag, IoU above zero and at
 * least `threshold`. Grouped by type tag.
 */
export function entityCandidates(
    gold: readonly Entity[],
    predicted: readonly Entity[],
    threshold: number
): Map<string, WeightedPair[]> {
    const byType = new Map<string, WeightedPair[]>();

    for (const p of predicted) {
        for (const g of gold) {
            if (p.type !== g.type) continue;
            const overlap = spanIoU(p.span, g.span);
            if (overlap <= 0 || overlap < threshold) continue;

            const group = byType.get(p.type) ?? [];
            group.push({ left: p.id, right: g.id, weight: overlap });
            byType.set(p.type, group);
        }
    }

    return byType;
}

/**
 * One-to-one entity alignment under approximate span match.
 *
 * @returns aligned pairs sorted by predicted id
 */
export function alignEntities(
    gold: readonly Entity[],
    predicted: readonly Entity[],
    options: { threshold: number; strategy: MatchingStrategy }
): EntityPair[] {
    const match = options.strategy === 'optimal' ? optimalMatch : greedyMatch;
    const pairs: EntityPair[] = [];

    for (const candidates of entityCandidates(gold, predicted, options.threshold).values()) {
        for (const { left, right, weight } of match(candidates)) {
            pairs.push({ predictedId: left, goldId: right, overlap: weight });
        }
    }

    return pairs.sort((a, b) => compareIds(a.predictedId, b.predictedId));
}
