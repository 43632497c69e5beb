import { compareIds } from '../utils/ids.js';

/**
 * An eligible (left, right) pair and its weight. Left is the predicted side.
 */
export interface WeightedPair {
    left: string;
    right: string;
    weight: number;
}

/**
 * Greedy maximum-weight matching.
 *
 * Repeatedly commits the heaviest pair whose sides are both free. Equal
 * weights go to the lexicographically smaller left id, then right id.
 * Terminates after at most min(|left|, |right|) commits.
 */
export function greedyMatch(candidates: readonly WeightedPair[]): WeightedPair[] {
    const sorted = [...candidates].sort(
        (a, b) => b.weight - a.weight || compareIds(a.left, b.left) || compareIds(a.right, b.right)
    );

    const usedLeft = new Set<string>();
    const usedRight = new Set<string>();
    const matches: WeightedPair[] = [];

    for (const pair of sorted) {
        if (usedLeft.has(pair.left) || usedRight.has(pair.right)) continue;
        usedLeft.add(pair.left);
        usedRight.add(pair.right);
        matches.push(pair);
    }

    return matches;
}

/**
 * Maximum-weight matching via the Hungarian algorithm (O(n²·m)).
 *
 * Pairs absent from `candidates` are ineligible: they may fill the
 * assignment internally but are never returned.
 */
export function optimalMatch(candidates: readonly WeightedPair[]): WeightedPair[] {
    if (candidates.length === 0) return [];

    const lefts = [...new Set(candidates.map((pair) => pair.left))].sort(compareIds);
    const rights = [...new Set(candidates.map((pair) => pair.right))].sort(compareIds);
    const byKey = new Map(candidates.map((pair) => [`${pair.left}\u0000${pair.right}`, pair]));

    // Rows must be the smaller side
    const transposed = lefts.length > rights.length;
    const rows = transposed ? rights : lefts;
    const cols = transposed ? lefts : rights;

    const pairAt = (row: number, col: number): WeightedPair | undefined => {
        const rowId = rows[row] ?? '';
        const colId = cols[col] ?? '';
        return byKey.get(transposed ? `${colId}\u0000${rowId}` : `${rowId}\u0000${colId}`);
    };

    const assignment = hungarian(rows.length, cols.length, (row, col) => -(pairAt(row, col)?.weight ?? 0));

    const matches: WeightedPair[] = [];
    assignment.forEach((col, row) => {
        const pair = pairAt(row, col);
        if (pair) matches.push(pair);
    });

    return matches.sort((a, b) => compareIds(a.left, b.left));
}

/**
 * Minimum-cost assignment of n rows to distinct columns of an n×m matrix (n ≤ m).
 * Returns, per row, the assigned column.
 */
function hungarian(n: number, m: number, cost: (row: number, col: number) => number): number[] {
    const u = new Array<number>(n + 1).fill(0);
    const v = new Array<number>(m + 1).fill(0);
    // p[col] = row (1-based) currently assigned to col; 0 = free
    const p = new Array<number>(m + 1).fill(0);
    const way = new Array<number>(m + 1).fill(0);
    const at = (values: number[], index: number): number => values[index] ?? 0;

    for (let i = 1; i <= n; i++) {
        p[0] = i;
        let j0 = 0;
        const minv = new Array<number>(m + 1).fill(Infinity);
        const used = new Array<boolean>(m + 1).fill(false);

        do {
            used[j0] = true;
            const i0 = at(p, j0);
            let delta = Infinity;
            let j1 = 0;

            for (let j = 1; j <= m; j++) {
                if (used[j]) continue;
                const current = cost(i0 - 1, j - 1) - at(u, i0) - at(v, j);
                if (current < at(minv, j)) {
                    minv[j] = current;
                    way[j] = j0;
                }
                if (at(minv, j) < delta) {
                    delta = at(minv, j);
                    j1 = j;
                }
            }

            for (let j = 0; j <= m; j++) {
                if (used[j]) {
                    const row = at(p, j);
                    u[row] = at(u, row) + delta;
                    v[j] = at(v, j) - delta;
                } else {
                    minv[j] = at(minv, j) - delta;
                }
            }

            j0 = j1;
        } while (at(p, j0) !== 0);

        do {
            const j1 = at(way, j0);
            p[j0] = at(p, j1);
            j0 = j1;
        } while (j0 !== 0);
    }

    const assignment = new Array<number>(n).fill(-1);
    for (let j = 1; j <= m; j++) {
        const row = at(p, j);
        if (row !== 0) assignment[row - 1] = j - 1;
    }
    return assignment;
}
