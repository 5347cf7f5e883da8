/**
 * Error codes for every failure the fetcher reports.
 */
export type ErrorCode =
    | 'PREREQUISITE_MISSING'
    | 'FETCH_FAILED'
    | 'CATALOG_INVALID'
    | 'TOOL_MISSING'
    | 'EXTRACTION_FAILED'
    | 'CANCELLED';

/**
 * Base class for fetcher errors. The code tells the orchestrator whether a
 * failure ends the whole run or only the current catalog entry.
 */
export class VcRuntimeError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'VcRuntimeError';
        this.code = code;
    }
}

/**
 * The destination's Downloads directory is missing
 */
export class PrerequisiteError extends VcRuntimeError {
    constructor(message: string) {
        super('PREREQUISITE_MISSING', message);
        this.name = 'PrerequisiteError';
    }
}

export class DownloadError extends VcRuntimeError {
    readonly url: string;

    constructor(url: string, cause?: unknown) {
        super('FETCH_FAILED', `Download failed: ${url}`, { cause });
        this.name = 'DownloadError';
        this.url = url;
    }
}

export class CatalogError extends VcRuntimeError {
    constructor(message: string) {
        super('CATALOG_INVALID', message);
        this.name = 'CatalogError';
    }
}

/**
 * A tool distribution was unpacked but the executable we need is not in it
 */
export class ToolError extends VcRuntimeError {
    constructor(message: string) {
        super('TOOL_MISSING', message);
        this.name = 'ToolError';
    }
}

export class ExtractionError extends VcRuntimeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('EXTRACTION_FAILED', message, options);
        this.name = 'ExtractionError';
    }
}

export class CancelledError extends VcRuntimeError {
    constructor() {
        super('CANCELLED', 'Cancelled');
        this.name = 'CancelledError';
    }
}

/**
 * Failures that only spoil one catalog entry; the batch carries on
 */
export function isEntryError(error: unknown): error is ExtractionError | ToolError {
    return error instanceof ExtractionError || error instanceof ToolError;
}

/**
 * Formats an error and its cause chain for the console
 */
export function describeError(error: unknown): string {
    if (!(error instanceof Error)) {
        return String(error);
    }
    const cause = error.cause;
    if (cause instanceof Error) {
        return `${error.message} (${cause.message})`;
    }
    return error.message;
}
