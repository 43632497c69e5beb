/**
 * Code-unit lexicographic comparison of identifiers ("T10" < "T2").
 * Locale-independent so orderings are stable across machines.
 */
export function compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
