import { EntityType, Modality, RelationType, type Span } from '../types/index.js';

/**
 * Normalization helpers for the tag spellings and mention strings found in
 * model outputs.
 */

const QUOTES = new Set(['"', "'", '‘', '’', '“', '”', '`', '´']);

/** Spellings models use for relation types, keyed by their squashed form */
const RELATION_TYPE_ALIASES: Record<string, RelationType> = {
    cause: RelationType.Causes,
    affect: RelationType.Affects,
    transmit: RelationType.Transmits,
    havebeenfoundon: RelationType.HasBeenFoundOn,
    foundon: RelationType.HasBeenFoundOn,
    occursat: RelationType.OccursOn,
};

function squash(value: string): string {
    return value.replace(/[\s_-]+/g, '').toLowerCase();
}

const RELATION_TYPES_BY_KEY = new Map<string, RelationType>(
    Object.values(RelationType).map((type) => [squash(type), type])
);
const ENTITY_TYPES_BY_KEY = new Map<string, EntityType>(
    Object.values(EntityType).map((type) => [type.toLowerCase(), type])
);
const MODALITIES_BY_KEY = new Map<string, Modality>(
    Object.values(Modality).map((modality) => [modality.toLowerCase(), modality])
);

/**
 * "Have been found on", "has_been_found_on", "HasBeenFoundOn" → HasBeenFoundOn.
 * Unknown spellings are returned unchanged so validation can name them.
 */
export function normalizeRelationType(raw: string): string {
    const key = squash(raw);
    return RELATION_TYPES_BY_KEY.get(key) ?? RELATION_TYPE_ALIASES[key] ?? raw;
}

/**
 * Case-insensitive match against the entity type tags.
 */
export function normalizeEntityType(raw: string): string {
    return ENTITY_TYPES_BY_KEY.get(raw.trim().toLowerCase()) ?? raw;
}

/**
 * Case-insensitive match against the modality tags; absent means Asserted.
 */
export function normalizeModality(raw: string | undefined): string {
    if (raw === undefined) return Modality.Asserted;
    return MODALITIES_BY_KEY.get(raw.trim().toLowerCase()) ?? raw;
}

/**
 * Strip one pair of surrounding quotes and outer whitespace.
 */
export function unquote(name: string): string {
    const trimmed = name.trim();
    const first = trimmed.charAt(0);
    const last = trimmed.charAt(trimmed.length - 1);
    if (trimmed.length >= 2 && QUOTES.has(first) && QUOTES.has(last)) {
        return trimmed.slice(1, -1).trim();
    }
    return trimmed;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find a mention in the text by its surface form (case-insensitive).
 *
 * Returns the first occurrence not listed in `claimed`, or the first
 * occurrence when all are claimed. Undefined when the name never occurs.
 */
export function locateMention(
    text: string,
    name: string,
    claimed: ReadonlySet<string> = new Set()
): Span | undefined {
    const needle = unquote(name);
    if (needle === '') return undefined;

    const pattern = new RegExp(escapeRegExp(needle), 'giu');
    let first: Span | undefined;

    for (const match of text.matchAll(pattern)) {
        if (match.index === undefined) continue;
        const span = { start: match.index, end: match.index + match[0].length };
        if (!claimed.has(spanKey(span))) return span;
        first ??= span;
    }

    return first;
}

export function spanKey(span: Span): string {
    return `${span.start}:${span.end}`;
}
