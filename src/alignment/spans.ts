import type { Span } from '../types/index.js';

/**
 * Intersection-over-Union of two half-open spans.
 * IoU = |intersection| / |union|, 0 for disjoint or empty spans.
 */
export function spanIoU(a: Span, b: Span): number {
    const intersection = Math.max(0, Math.min(a.end, b.end) - Math.max(a.start, b.start));
    const union = (a.end - a.start) + (b.end - b.start) - intersection;

    if (union <= 0) return 0;
    return intersection / union;
}
