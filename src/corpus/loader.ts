import {
    LINK_AUTHORITIES,
    RELATION_SCHEMA,
    isRelationType,
    type CoreferenceChain,
    type Document,
    type Entity,
    type ExcludedDocument,
    type Relation,
    type RelationArgument,
    type Span,
} from '../types/index.js';
import { validateChains, validateEntity, validateRelation, type ValidationFailure } from '../schema/validation.js';
import { orderRelations } from '../graph/relation-order.js';
import { LoadError, type LoadErrorKind } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseAnnotationText } from './annotation-text.js';
import {
    RawAnnotationRecordSchema,
    type RawAnnotationRecord,
    type RawEntity,
    type RawRelation,
} from './records.js';
import { locateMention, normalizeEntityType, normalizeModality, normalizeRelationType, spanKey } from './normalize.js';

/**
 * One document to load: its text and its (parsed or raw) annotation record.
 */
export interface DocumentInput {
    id: string;
    text: string;
    /** Parsed JSON value, or annotation text still to be cleaned and parsed */
    record: unknown;
}

export interface LoadedCorpus {
    documents: Document[];
    excluded: ExcludedDocument[];
}

const RULE_KINDS: Record<ValidationFailure['rule'], LoadErrorKind> = {
    SpanOrder: 'MalformedSpan',
    SpanBounds: 'MalformedSpan',
    UnknownEntityType: 'UnknownTypeTag',
    UnknownRelationType: 'UnknownTypeTag',
    UnknownModality: 'UnknownTypeTag',
    UnknownAuthority: 'UnknownTypeTag',
    UnknownChainMember: 'DanglingReference',
    EmptyLinkCode: 'SchemaViolation',
    UnknownRole: 'SchemaViolation',
    DuplicateRole: 'SchemaViolation',
    MissingRole: 'SchemaViolation',
    ArgumentKind: 'SchemaViolation',
    EmptyChain: 'SchemaViolation',
    DuplicateChainId: 'SchemaViolation',
    OverlappingChains: 'SchemaViolation',
};

function toLoadError(documentId: string, failure: ValidationFailure): LoadError {
    return new LoadError(failure.message, RULE_KINDS[failure.rule], documentId, failure.itemId);
}

function parseRecord(documentId: string, record: unknown): RawAnnotationRecord {
    let value = record;
    if (typeof record === 'string') {
        try {
            value = parseAnnotationText(record);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new LoadError(`Annotation text is not valid JSON: ${reason}`, 'MalformedRecord', documentId);
        }
    }

    const parsed = RawAnnotationRecordSchema.safeParse(value);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.join('.') || 'record';
        throw new LoadError(`Malformed annotation record at ${where}: ${issue?.message ?? 'rejected'}`, 'MalformedRecord', documentId);
    }
    return parsed.data;
}

/**
 * Resolve an entity's span: explicit offsets first, then its name in the text.
 */
function resolveSpan(documentId: string, id: string, raw: RawEntity, text: string, claimed: Set<string>): Span {
    if (raw.start !== undefined && raw.end !== undefined) {
        return { start: raw.start, end: raw.end };
    }
    if (raw.span) {
        return { start: raw.span[0], end: raw.span[1] };
    }
    if (raw.name !== undefined) {
        const located = locateMention(text, raw.name, claimed);
        if (located) return located;
        throw new LoadError(`Mention "${raw.name}" does not occur in the text`, 'MalformedSpan', documentId, id);
    }
    throw new LoadError('Entity has neither offsets nor a name', 'MalformedSpan', documentId, id);
}

function loadEntities(documentId: string, rawEntities: readonly RawEntity[], text: string): Entity[] {
    const entities: Entity[] = [];
    const ids = new Set<string>();
    const claimed = new Set<string>();

    rawEntities.forEach((raw, index) => {
        const id = raw.id ?? `T${index + 1}`;
        if (ids.has(id)) {
            throw new LoadError(`Duplicate entity id ${id}`, 'SchemaViolation', documentId, id);
        }
        ids.add(id);

        const span = resolveSpan(documentId, id, raw, text, claimed);
        const authority = LINK_AUTHORITIES.find((candidate) => raw[candidate] !== undefined);
        const code = authority ? raw[authority] : undefined;

        const result = validateEntity(
            {
                id,
                type: normalizeEntityType(raw.type),
                span,
                text: text.slice(span.start, span.end),
                link: authority && code !== undefined ? { authority, code } : undefined,
            },
            text.length
        );
        if (!result.ok) throw toLoadError(documentId, result.failure);

        claimed.add(spanKey(span));
        entities.push(result.value);
    });

    return entities;
}

/**
 * Map `source` / `target` keys onto the first and second role of the relation type.
 */
function roleFor(type: string, key: string): string {
    if (!isRelationType(type)) return key;
    const roles = RELATION_SCHEMA[type];
    if (key === 'source') return roles[0]?.name ?? key;
    if (key === 'target') return roles[1]?.name ?? key;
    return key;
}

function rawArguments(raw: RawRelation, type: string): Array<{ role: string; id: string }> {
    const collected: Array<{ role: string; id: string }> = [];

    for (const [key, value] of Object.entries(raw.arguments ?? {})) {
        const role = roleFor(type, key);
        for (const id of Array.isArray(value) ? value : [value]) {
            collected.push({ role, id });
        }
    }

    // positional form only applies without explicit arguments
    if (raw.arguments !== undefined) return collected;

    if (raw.source !== undefined) collected.push({ role: roleFor(type, 'source'), id: raw.source });
    const target = raw.target ?? raw.name;
    if (target !== undefined) collected.push({ role: roleFor(type, 'target'), id: target });

    return collected;
}

function loadRelations(
    documentId: string,
    rawRelations: readonly RawRelation[],
    entityIds: ReadonlySet<string>
): Relation[] {
    const relationIds = rawRelations.map((raw, index) => raw.id ?? `R${index + 1}`);
    const seen = new Set<string>();
    for (const id of relationIds) {
        if (seen.has(id) || entityIds.has(id)) {
            throw new LoadError(`Duplicate identifier ${id}`, 'SchemaViolation', documentId, id);
        }
        seen.add(id);
    }

    return rawRelations.map((raw, index) => {
        const id = relationIds[index] ?? `R${index + 1}`;
        const type = normalizeRelationType(raw.type);

        const args = rawArguments(raw, type).map(({ role, id: refId }): RelationArgument => {
            if (entityIds.has(refId)) return { role, ref: { kind: 'entity', id: refId } };
            if (seen.has(refId)) return { role, ref: { kind: 'relation', id: refId } };
            throw new LoadError(`Argument "${role}" references unknown id ${refId}`, 'DanglingReference', documentId, id);
        });

        const result = validateRelation({ id, type, arguments: args, modality: normalizeModality(raw.modality) });
        if (!result.ok) throw toLoadError(documentId, result.failure);
        return result.value;
    });
}

/**
 * Explicit chains keep their ids; the others get the next free `C<n>`.
 */
function collectChains(record: RawAnnotationRecord): CoreferenceChain[] {
    const taken = new Set<string>();
    for (const chain of record.chains ?? []) {
        if (chain.id !== undefined) taken.add(chain.id);
    }

    let counter = 0;
    const nextId = (): string => {
        let id: string;
        do {
            counter++;
            id = `C${counter}`;
        } while (taken.has(id));
        taken.add(id);
        return id;
    };

    const chains: CoreferenceChain[] = [];
    for (const chain of record.chains ?? []) {
        chains.push({ id: chain.id ?? nextId(), entityIds: chain.entityIds });
    }
    for (const members of record.equivalences ?? []) {
        chains.push({ id: nextId(), entityIds: [...new Set(members)] });
    }
    return chains;
}

/**
 * Load and validate one document. All-or-nothing.
 *
 * @throws LoadError naming the document and, where known, the offending item
 */
export function loadDocument(input: DocumentInput): Document {
    const { id: documentId, text } = input;
    const record = parseRecord(documentId, input.record);

    const entities = loadEntities(documentId, record.entities ?? [], text);
    const entityIds = new Set(entities.map((entity) => entity.id));

    const relations = loadRelations(documentId, [...(record.relations ?? []), ...(record.relationships ?? [])], entityIds);

    const chainResult = validateChains(collectChains(record), entityIds);
    if (!chainResult.ok) throw toLoadError(documentId, chainResult.failure);

    const { cyclic } = orderRelations(relations);
    if (cyclic.length > 0) {
        throw new LoadError(
            `Relation nesting forms a cycle through ${cyclic.join(', ')}`,
            'CyclicRelationReference',
            documentId,
            cyclic[0]
        );
    }

    return { id: documentId, text, entities, chains: chainResult.value, relations };
}

/**
 * Load many documents. A document that fails is excluded and reported;
 * the others still load. Later duplicates of a document id are excluded.
 */
export function loadCorpus(inputs: readonly DocumentInput[], side: ExcludedDocument['side']): LoadedCorpus {
    const logger = getLogger();
    const documents: Document[] = [];
    const excluded: ExcludedDocument[] = [];
    const seen = new Set<string>();

    for (const input of inputs) {
        if (seen.has(input.id)) {
            excluded.push({ documentId: input.id, side, kind: 'DuplicateDocument', message: `Document ${input.id} appears more than once`, action: 'excluded' });
            continue;
        }
        seen.add(input.id);

        try {
            documents.push(loadDocument(input));
        } catch (error) {
            if (!(error instanceof LoadError)) throw error;
            logger.warn({ documentId: error.documentId, kind: error.kind, itemId: error.itemId, side }, error.message);
            excluded.push({ documentId: error.documentId, side, kind: error.kind, message: error.message, action: 'excluded' });
        }
    }

    logger.debug({ side, loaded: documents.length, excluded: excluded.length }, 'Corpus loaded');
    return { documents, excluded };
}
