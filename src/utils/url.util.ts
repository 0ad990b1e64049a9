import { FailureKind } from '../enums/failure-kind.enum';
import { Failure } from '../interfaces/fetch.interface';

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/**
 * Parses an absolute http(s) URL with a non-empty host, or returns null.
 */
export function parseHttpUrl(raw: string, base?: string): URL | null {
    let parsed: URL;
    try {
        parsed = base === undefined ? new URL(raw) : new URL(raw, base);
    } catch {
        return null;
    }
    if (!ALLOWED_PROTOCOLS.has(parsed.protocol) || parsed.hostname === '') {
        return null;
    }
    return parsed;
}

/** scheme://host[:port] */
export function originOf(raw: string): string | null {
    const parsed = parseHttpUrl(raw);
    return parsed ? `${parsed.protocol}//${parsed.host}` : null;
}

export function invalidUrl(url: string): Failure {
    return {
        ok: false,
        url,
        kind: FailureKind.VALIDATION,
        error: 'Invalid URL: expected an absolute http or https URL',
    };
}

export function unexpectedFailure(url: string, error: unknown): Failure {
    return {
        ok: false,
        url,
        kind: FailureKind.UNEXPECTED,
        error: error instanceof Error ? error.message : String(error),
    };
}
