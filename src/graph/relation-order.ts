import { DirectedGraph } from 'graphology';
import type { Relation } from '../types/index.js';
import { compareIds } from '../utils/ids.js';

/**
 * Dependency order of a document's relations.
 */
export interface RelationOrder {
    /** Relation ids, every nested relation before the relations that take it as argument */
    order: string[];
    /** Relations on or behind a nesting cycle; empty for a valid document */
    cyclic: string[];
}

/**
 * Topologically sort relations by nesting (Kahn's algorithm, ties broken by id).
 *
 * Edges run from the argument relation to the relation that uses it, so the
 * innermost relations come first. Arguments pointing at unknown relations are
 * ignored here; dangling references are the loader's concern.
 */
export function orderRelations(relations: readonly Relation[]): RelationOrder {
    const graph = new DirectedGraph({ allowSelfLoops: false });
    const selfReferencing = new Set<string>();

    for (const relation of relations) {
        graph.mergeNode(relation.id);
    }

    for (const relation of relations) {
        for (const argument of relation.arguments) {
            if (argument.ref.kind !== 'relation') continue;
            if (argument.ref.id === relation.id) {
                selfReferencing.add(relation.id);
            } else if (graph.hasNode(argument.ref.id)) {
                graph.mergeEdge(argument.ref.id, relation.id);
            }
        }
    }

    const remaining = new Map<string, number>();
    const ready: string[] = [];
    graph.forEachNode((node) => {
        const degree = graph.inDegree(node);
        remaining.set(node, degree);
        if (degree === 0 && !selfReferencing.has(node)) ready.push(node);
    });
    ready.sort(compareIds);

    const order: string[] = [];
    while (ready.length > 0) {
        const node = ready.shift();
        if (node === undefined) break;
        order.push(node);

        graph.forEachOutNeighbor(node, (dependent) => {
            const degree = (remaining.get(dependent) ?? 0) - 1;
            remaining.set(dependent, degree);
            if (degree === 0 && !selfReferencing.has(dependent)) {
                insertSorted(ready, dependent);
            }
        });
    }

    const placed = new Set(order);
    const cyclic = graph.nodes().filter((node) => !placed.has(node)).sort(compareIds);

    return { order, cyclic };
}

function insertSorted(queue: string[], id: string): void {
    const index = queue.findIndex((queued) => compareIds(id, queued) < 0);
    if (index === -1) queue.push(id);
    else queue.splice(index, 0, id);
}
