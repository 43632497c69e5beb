import type { Cluster, ClusterLink, CoreferenceAlignment, Document, EntityPair } from '../types/index.js';
import { compareIds } from '../utils/ids.js';

const SINGLETON_PREFIX = 'singleton:';

/**
 * Partition a document's entities into clusters: its explicit chains plus
 * one implicit singleton per unchained entity.
 */
export function buildClusters(document: Document): {
    clusters: Map<string, Cluster>;
    clusterOf: Map<string, string>;
} {
    const clusters = new Map<string, Cluster>();
    const clusterOf = new Map<string, string>();

    for (const chain of document.chains) {
        clusters.set(chain.id, { id: chain.id, entityIds: chain.entityIds, explicit: true });
        for (const entityId of chain.entityIds) clusterOf.set(entityId, chain.id);
    }

    for (const entity of document.entities) {
        if (clusterOf.has(entity.id)) continue;
        const id = `${SINGLETON_PREFIX}${entity.id}`;
        clusters.set(id, { id, entityIds: [entity.id], explicit: false });
        clusterOf.set(entity.id, id);
    }

    return { clusters, clusterOf };
}

/**
 * Count, for every (predicted cluster, gold cluster), the aligned entity
 * pairs that fall inside both. The counts are kept raw for partial-credit
 * scoring; only links with at least `minSharedPairs` are returned.
 */
export function alignCoreference(
    gold: Document,
    predicted: Document,
    entityPairs: readonly EntityPair[],
    minSharedPairs: number
): CoreferenceAlignment {
    const goldSide = buildClusters(gold);
    const predictedSide = buildClusters(predicted);

    const shared = new Map<string, ClusterLink>();
    for (const pair of entityPairs) {
        const predictedCluster = predictedSide.clusterOf.get(pair.predictedId);
        const goldCluster = goldSide.clusterOf.get(pair.goldId);
        if (predictedCluster === undefined || goldCluster === undefined) continue;

        const key = `${predictedCluster}\u0000${goldCluster}`;
        const link = shared.get(key) ?? { predictedCluster, goldCluster, sharedPairs: 0 };
        link.sharedPairs += 1;
        shared.set(key, link);
    }

    const links = [...shared.values()]
        .filter((link) => link.sharedPairs >= minSharedPairs)
        .sort((a, b) => compareIds(a.predictedCluster, b.predictedCluster) || compareIds(a.goldCluster, b.goldCluster));

    return {
        predictedClusters: predictedSide.clusters,
        goldClusters: goldSide.clusters,
        predictedClusterOf: predictedSide.clusterOf,
        goldClusterOf: goldSide.clusterOf,
        links,
    };
}
