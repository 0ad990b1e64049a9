import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { TextDecoder } from 'util';
import { HttpClientService } from '../http-client/http-client.service';
import { PageResult } from '../interfaces/fetch.interface';
import { unexpectedFailure } from '../utils/url.util';

/**
 * Phrases that suggest a raw directory index rather than authored content.
 * A heuristic: server banners in ordinary pages produce false positives.
 */
export const LISTING_INDICATORS: readonly string[] = [
    'index of',
    'directory listing',
    'parent directory',
    'apache',
    'nginx',
];

export function detectListing(text: string): boolean {
    const lowered = text.toLowerCase();
    return LISTING_INDICATORS.some((indicator) => lowered.includes(indicator));
}

@Injectable()
export class PageFetcherService {
    private readonly logger = new Logger(PageFetcherService.name);
    // Non-fatal: invalid sequences become U+FFFD.
    private readonly decoder = new TextDecoder('utf-8', { fatal: false });

    constructor(private readonly httpClient: HttpClientService) { }

    /**
     * GETs a page and parses it. The returned document belongs to this result and is
     * meant to be read within the operation that fetched it.
     */
    async fetchPage(url: string): Promise<PageResult> {
        const fetched = await this.httpClient.get(url);
        if (!fetched.ok) {
            return fetched;
        }

        try {
            const text = this.decoder.decode(fetched.body);
            const document = cheerio.load(text);
            const isListing = detectListing(text);

            this.logger.debug(`Parsed ${fetched.finalUrl} (${fetched.body.byteLength} bytes, listing: ${isListing})`);
            return { ...fetched, text, document, isListing };
        } catch (error) {
            this.logger.error(`Failed to parse ${url}`, error instanceof Error ? error.stack : String(error));
            return unexpectedFailure(url, error);
        }
    }
}
