/**
 * Raised for settings or artifacts that would produce corrupt state if the
 * process carried on. CLIs treat it as fatal.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export class EmbeddingDimensionError extends ConfigurationError {
    constructor(
        public readonly expected: number,
        public readonly actual: number,
        context: string
    ) {
        super(`Embedding dimension mismatch for ${context}: expected ${expected}, got ${actual}.`);
        this.name = "EmbeddingDimensionError";
    }
}

export class CatalogIntegrityError extends ConfigurationError {
    constructor(message: string) {
        super(message);
        this.name = "CatalogIntegrityError";
    }
}

export class IndexIntegrityError extends ConfigurationError {
    constructor(
        message: string,
        public readonly missingIds: number[] = [],
        public readonly unexpectedIds: number[] = []
    ) {
        super(message);
        this.name = "IndexIntegrityError";
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
