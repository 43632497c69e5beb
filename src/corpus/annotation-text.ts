/**
 * Cleanup of model-produced annotation text before JSON parsing.
 *
 * Chat models wrap their JSON in Markdown fences, leave trailing commas,
 * and sometimes answer with one `{ entities, relationships }` chunk per
 * paragraph instead of a single object.
 */

const CODE_FENCE = /```(?:json)?([\s\S]*)```/i;
const TRAILING_COMMA = /,(?=\s*[}\]])/g;

/**
 * Return the content of the outermost code fence, or the text unchanged.
 */
export function stripCodeFence(content: string): string {
    const match = CODE_FENCE.exec(content);
    return match?.[1] ?? content;
}

/**
 * Remove commas directly followed by a closing brace or bracket.
 */
export function stripTrailingCommas(content: string): string {
    return content.replace(TRAILING_COMMA, '');
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Merge a list of `{ entities, relationships }` chunks into one record.
 * Non-array values pass through untouched.
 */
export function squashChunks(value: unknown): unknown {
    if (!Array.isArray(value)) return value;

    const entities: unknown[] = [];
    const relationships: unknown[] = [];
    for (const chunk of value) {
        if (!isRecord(chunk)) continue;
        const chunkEntities = chunk['entities'];
        const chunkRelations = chunk['relationships'] ?? chunk['relations'];
        if (Array.isArray(chunkEntities)) entities.push(...chunkEntities);
        if (Array.isArray(chunkRelations)) relationships.push(...chunkRelations);
    }

    return { entities, relationships };
}

/**
 * Parse raw annotation text (gold JSON or a model answer) into a JSON value.
 *
 * @throws SyntaxError when the cleaned text is still not valid JSON
 */
export function parseAnnotationText(content: string): unknown {
    const cleaned = stripTrailingCommas(stripCodeFence(content.trim()));
    return squashChunks(JSON.parse(cleaned));
}
