import { Injectable, Logger } from '@nestjs/common';
import { Failure, LoadedPage } from '../interfaces/fetch.interface';
import {
    ImagesReport,
    ImagesSuccess,
    LinksReport,
    LinksSuccess,
    MetaReport,
    MetaSuccess,
    TextReport,
    TextSuccess,
    TitleReport,
    TitleSuccess,
} from '../interfaces/report.interface';
import { PageFetcherService } from '../page-fetcher/page-fetcher.service';
import { invalidUrl, parseHttpUrl, unexpectedFailure } from '../utils/url.util';
import { cleanText, truncate } from './text.util';

export const DEFAULT_SNIPPET_CHARS = 500;

const NON_CONTENT_SELECTOR = 'script, style, nav, header, footer';

/**
 * Single-page extractors: title, links, images, meta description and a text snippet.
 * Each fetches the page, reads its document, and returns plain data.
 */
@Injectable()
export class PageExtractorService {
    private readonly logger = new Logger(PageExtractorService.name);

    constructor(private readonly pageFetcher: PageFetcherService) { }

    title(url: string): Promise<TitleReport> {
        return this.withPage<TitleSuccess>(url, 'title', (page) => {
            const raw = page.document('title').first().text();
            const title = cleanText(raw);
            return { ok: true, url: page.finalUrl, title: title || null };
        });
    }

    links(url: string): Promise<LinksReport> {
        return this.withPage<LinksSuccess>(url, 'links', (page) => {
            const $ = page.document;
            const links = new Set<string>();
            $('a[href]').each((_, element) => {
                const href = ($(element).attr('href') ?? '').trim();
                if (!href || href.startsWith('#')) {
                    return;
                }
                const target = parseHttpUrl(href, page.finalUrl);
                if (target) {
                    links.add(target.href);
                }
            });
            return { ok: true, url: page.finalUrl, links: [...links].sort() };
        });
    }

    images(url: string): Promise<ImagesReport> {
        return this.withPage<ImagesSuccess>(url, 'images', (page) => {
            const $ = page.document;
            const images = new Set<string>();
            $('img[src]').each((_, element) => {
                const src = ($(element).attr('src') ?? '').trim();
                if (!src) {
                    return;
                }
                try {
                    images.add(new URL(src, page.finalUrl).href);
                } catch {
                    this.logger.debug(`Skipping unresolvable image source ${src}`);
                }
            });
            return { ok: true, url: page.finalUrl, images: [...images].sort() };
        });
    }

    metaDescription(url: string): Promise<MetaReport> {
        return this.withPage<MetaSuccess>(url, 'meta', (page) => {
            const $ = page.document;
            let tag = $('meta[name="description"]').first();
            if (tag.length === 0) {
                tag = $('meta[property="og:description"]').first();
            }
            const description = tag.length > 0 ? cleanText(tag.attr('content')) : null;
            return { ok: true, url: page.finalUrl, description };
        });
    }

    textSnippet(url: string, maxChars: number = DEFAULT_SNIPPET_CHARS): Promise<TextReport> {
        return this.withPage<TextSuccess>(url, 'text', (page) => {
            const $ = page.document;
            $(NON_CONTENT_SELECTOR).remove();
            const text = truncate(cleanText($.root().text()), maxChars);
            return { ok: true, url: page.finalUrl, text, maxChars };
        });
    }

    /**
     * Fetches `url` and hands the parsed page to `read`; the page does not outlive the call.
     */
    private async withPage<T extends { ok: true }>(
        url: string,
        operation: string,
        read: (page: LoadedPage) => T,
    ): Promise<T | Failure> {
        if (!parseHttpUrl(url)) {
            return invalidUrl(url);
        }

        try {
            const page = await this.pageFetcher.fetchPage(url);
            if (!page.ok) {
                return page;
            }
            const report = read(page);
            this.logger.log(`Extracted ${operation} from ${page.finalUrl}`);
            return report;
        } catch (error) {
            this.logger.error(`Extracting ${operation} from ${url} failed`, error instanceof Error ? error.stack : String(error));
            return unexpectedFailure(url, error);
        }
    }
}
