import { z } from 'zod';

/**
 * Zod schemas for serialized annotation records, as written by the
 * corpus release (gold) and by prompted models (predictions).
 */

const IdSchema = z.union([z.string(), z.number()]).transform(String);

export const RawEntitySchema = z.object({
    id: IdSchema.optional(),
    type: z.string(),
    name: z.string().optional(),
    start: z.number().optional(),
    end: z.number().optional(),
    span: z.tuple([z.number(), z.number()]).optional(),
    NCBI_Taxonomy: IdSchema.optional(),
    GeoNames: IdSchema.optional(),
    OntoBiotope: IdSchema.optional(),
});

export const RawRelationSchema = z.object({
    id: IdSchema.optional(),
    type: z.string(),
    /** role → argument id(s); `source` / `target` keys are positional */
    arguments: z.record(z.union([IdSchema, z.array(IdSchema)])).optional(),
    source: IdSchema.optional(),
    target: IdSchema.optional(),
    /** Some models put the second argument under `name` */
    name: IdSchema.optional(),
    modality: z.string().optional(),
});

export const RawChainSchema = z.object({
    id: IdSchema.optional(),
    entityIds: z.array(IdSchema),
});

export const RawAnnotationRecordSchema = z.object({
    entities: z.array(RawEntitySchema).nullish(),
    relations: z.array(RawRelationSchema).nullish(),
    relationships: z.array(RawRelationSchema).nullish(),
    /** Sets of entity ids that corefer */
    equivalences: z.array(z.array(IdSchema)).nullish(),
    chains: z.array(RawChainSchema).nullish(),
});

export type RawEntity = z.infer<typeof RawEntitySchema>;
export type RawRelation = z.infer<typeof RawRelationSchema>;
export type RawAnnotationRecord = z.infer<typeof RawAnnotationRecordSchema>;
