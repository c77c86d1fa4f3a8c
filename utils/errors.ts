import axios from 'axios';
import { ZodError } from 'zod';

export type ServiceErrorCode =
    | 'NETWORK'
    | 'TIMEOUT'
    | 'DATA_SHAPE';

/**
 * Failure of one upstream lookup (DexScreener, Twitter, Reddit).
 * Callers in the report pipeline log it and fall back to "no data".
 */
export class ServiceError extends Error {
    public readonly code: ServiceErrorCode;
    public readonly source: string;
    public override readonly cause?: unknown;

    constructor(input: { code: ServiceErrorCode; source: string; message: string; cause?: unknown }) {
        super(input.message);
        this.name = 'ServiceError';
        this.code = input.code;
        this.source = input.source;
        this.cause = input.cause;
    }
}

export class ConfigError extends Error {
    public readonly missing: readonly string[];

    constructor(missing: readonly string[]) {
        super(`Missing required environment variables: ${missing.join(', ')}`);
        this.name = 'ConfigError';
        this.missing = missing;
    }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export function toServiceError(source: string, err: unknown): ServiceError {
    if (err instanceof ServiceError) return err;

    if (err instanceof ZodError) {
        const issue = err.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        return new ServiceError({
            code: 'DATA_SHAPE',
            source,
            message: `Unexpected response shape${where}`,
            cause: err
        });
    }

    if (axios.isAxiosError(err)) {
        const code: ServiceErrorCode = err.code && TIMEOUT_CODES.has(err.code) ? 'TIMEOUT' : 'NETWORK';
        const status = err.response?.status;
        return new ServiceError({
            code,
            source,
            message: status ? `HTTP ${status}: ${err.message}` : err.message,
            cause: err
        });
    }

    if (err instanceof Error) {
        const code: ServiceErrorCode = err.message.toLowerCase().includes('timeout') ? 'TIMEOUT' : 'NETWORK';
        return new ServiceError({ code, source, message: err.message, cause: err });
    }

    return new ServiceError({ code: 'NETWORK', source, message: String(err), cause: err });
}
