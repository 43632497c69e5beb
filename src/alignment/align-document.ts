import type { Document, DocumentAlignment, EvaluationConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { alignCoreference } from './coreference.js';
import { alignEntities } from './entity-alignment.js';
import { alignRelations } from './relation-alignment.js';

/**
 * Align one predicted document against its gold document:
 *
 * 1. Entities (typed, approximate span match, one-to-one)
 * 2. Coreference clusters (raw shared-pair counts)
 * 3. Relations (exact argument match under the entity alignment, innermost first)
 *
 * Always returns; items without an eligible counterpart stay unmatched.
 */
export function alignDocument(gold: Document, predicted: Document, config: EvaluationConfig): DocumentAlignment {
    const entityPairs = alignEntities(gold.entities, predicted.entities, {
        threshold: config.entityOverlapThreshold,
        strategy: config.matching,
    });
    const entities = new Map(entityPairs.map((pair) => [pair.predictedId, pair.goldId]));

    const coreference = alignCoreference(gold, predicted, entityPairs, config.corefMinSharedPairs);
    const { relations, pairs: relationPairs, modalityMismatches } = alignRelations(
        gold.relations,
        predicted.relations,
        entities
    );

    getLogger().debug(
        {
            documentId: gold.id,
            entityPairs: entityPairs.length,
            relationPairs: relationPairs.length,
            clusterLinks: coreference.links.length,
            modalityMismatches: modalityMismatches.length,
        },
        'Document aligned'
    );

    return {
        documentId: gold.id,
        entities,
        entityPairs,
        relations,
        relationPairs,
        coreference,
        modalityMismatches,
    };
}
