/**
 * Classification of document load failures.
 */
export type LoadErrorKind =
    | 'MalformedRecord'
    | 'MalformedSpan'
    | 'UnknownTypeTag'
    | 'DanglingReference'
    | 'CyclicRelationReference'
    | 'SchemaViolation';

/**
 * A document could not be loaded. Fatal for that document only.
 */
export class LoadError extends Error {
    constructor(
        message: string,
        public readonly kind: LoadErrorKind,
        public readonly documentId: string,
        public readonly itemId?: string
    ) {
        super(message);
        this.name = 'LoadError';
    }
}

/**
 * Invalid run configuration. Raised before any document is processed.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly field: string
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}
