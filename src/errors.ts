import type { ZodIssue } from 'zod';

// -----------------------------------------------------------------------------
// Error hierarchy shared by both API flavors and the CLI.
// -----------------------------------------------------------------------------

export class ClinicsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ClinicsError';
    }
}

/** No credential available, or the config file could not be used. */
export class ConfigurationError extends ClinicsError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** A precondition failed before any request was issued. */
export class ValidationError extends ClinicsError {
    constructor(message: string, public readonly issues: ZodIssue[] = []) {
        super(message);
        this.name = 'ValidationError';
    }
}

export interface ApiErrorDetails {
    method: string;
    url: string;
    /** `null` when no response arrived (network failure or timeout). */
    status: number | null;
    body: string;
}

/**
 * The remote answered outside [200, 300), or never answered at all.
 * The message embeds the response text verbatim.
 */
export class ApiError extends ClinicsError {
    readonly method: string;
    readonly url: string;
    readonly status: number | null;
    readonly body: string;

    constructor(action: string, details: ApiErrorDetails) {
        const statusLabel = details.status === null ? 'no response' : String(details.status);
        super(`${action}: ${statusLabel} - ${details.body}`);
        this.name = 'ApiError';
        this.method = details.method;
        this.url = details.url;
        this.status = details.status;
        this.body = details.body;
    }
}

/** A 2xx body that the client cannot read (not JSON, or missing a field it needs). */
export class UnexpectedResponseError extends ClinicsError {
    constructor(message: string, public readonly body: string) {
        super(message);
        this.name = 'UnexpectedResponseError';
    }
}

export class InputFileNotFoundError extends ClinicsError {
    constructor(public readonly filePath: string) {
        super(`File not found: ${filePath}`);
        this.name = 'InputFileNotFoundError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
