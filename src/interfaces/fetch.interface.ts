import type { CheerioAPI } from 'cheerio';
import { FailureKind } from '../enums/failure-kind.enum';

/**
 * Any per-request or per-operation failure. Failures are returned, never thrown,
 * so callers branch on `ok`.
 */
export interface Failure {
    ok: false;
    url: string;
    kind: FailureKind;
    error: string;
    status?: number;
}

export interface HeadSuccess {
    ok: true;
    url: string;
    finalUrl: string;
    status: number;
    headers: Record<string, string>;
}

export interface FetchSuccess extends HeadSuccess {
    body: Buffer;
}

export type HeadResult = HeadSuccess | Failure;
export type FetchResult = FetchSuccess | Failure;

export interface LoadedPage extends FetchSuccess {
    text: string;
    document: CheerioAPI;
    isListing: boolean;
}

export type PageResult = LoadedPage | Failure;
