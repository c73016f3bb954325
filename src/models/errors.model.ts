export type CatalogErrorCode =
    | "CATALOG_UNAVAILABLE"
    | "CATALOG_NOT_LOADED"
    | "VALIDATION_ERROR";

export class CatalogError extends Error {
    code: CatalogErrorCode;
    status: number;
    retryable: boolean;
    details?: unknown;

    constructor(
        message: string,
        options: {
            code: CatalogErrorCode;
            status: number;
            retryable: boolean;
            details?: unknown;
            cause?: unknown;
        }
    ) {
        super(message, { cause: options.cause });
        this.name = "CatalogError";
        this.code = options.code;
        this.status = options.status;
        this.retryable = options.retryable;
        this.details = options.details;
    }
}

// Remote CSV (or local file) could not be read. Fatal for that load attempt only.
export class CatalogLoadError extends CatalogError {
    source: string;

    constructor(message: string, source: string, cause?: unknown) {
        super(message, { code: "CATALOG_UNAVAILABLE", status: 503, retryable: true, cause });
        this.name = "CatalogLoadError";
        this.source = source;
    }
}

export class CatalogNotLoadedError extends CatalogError {
    constructor() {
        super("Phone catalog has not been loaded yet", { code: "CATALOG_NOT_LOADED", status: 503, retryable: true });
        this.name = "CatalogNotLoadedError";
    }
}

export class PreferenceValidationError extends CatalogError {
    errors: string[];

    constructor(errors: string[]) {
        super(errors.join("; "), { code: "VALIDATION_ERROR", status: 400, retryable: false, details: errors });
        this.name = "PreferenceValidationError";
        this.errors = errors;
    }
}

export function isCatalogError(error: unknown): error is CatalogError {
    return error instanceof CatalogError;
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
