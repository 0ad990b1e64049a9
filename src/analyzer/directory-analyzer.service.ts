import { Injectable, Logger } from '@nestjs/common';
import { TargetKind } from '../enums/target-kind.enum';
import { LoadedPage } from '../interfaces/fetch.interface';
import { AnalysisReport } from '../interfaces/report.interface';
import { PageFetcherService } from '../page-fetcher/page-fetcher.service';
import { invalidUrl, parseHttpUrl, unexpectedFailure } from '../utils/url.util';

/** Entries kept per list; pages with more anchors are reported partially. */
export const ANALYSIS_LIST_LIMIT = 20;

const FILE_EXTENSION = /\.[a-z0-9]{1,4}$/i;

/**
 * A target is a file when its path ends in a dot and one to four alphanumerics,
 * so "/a/b.tar.gz" is a file and "/a/b/" or "/a/b" are links.
 */
export function classifyTarget(target: URL): TargetKind {
    return FILE_EXTENSION.test(target.pathname) ? TargetKind.FILE : TargetKind.LINK;
}

@Injectable()
export class DirectoryAnalyzerService {
    private readonly logger = new Logger(DirectoryAnalyzerService.name);

    constructor(private readonly pageFetcher: PageFetcherService) { }

    async analyze(url: string): Promise<AnalysisReport> {
        if (!parseHttpUrl(url)) {
            return invalidUrl(url);
        }

        try {
            const page = await this.pageFetcher.fetchPage(url);
            if (!page.ok) {
                return page;
            }

            const { links, files } = this.collectTargets(page);
            this.logger.log(`Analyzed ${page.finalUrl}: ${links.length} links, ${files.length} files, listing: ${page.isListing}`);

            return {
                ok: true,
                url: page.finalUrl,
                status: page.status,
                isListing: page.isListing,
                server: page.headers['server'] ?? '',
                links: links.slice(0, ANALYSIS_LIST_LIMIT),
                files: files.slice(0, ANALYSIS_LIST_LIMIT),
                linkCount: links.length,
                fileCount: files.length,
            };
        } catch (error) {
            this.logger.error(`Analysis of ${url} failed`, error instanceof Error ? error.stack : String(error));
            return unexpectedFailure(url, error);
        }
    }

    /** Anchors in document order, resolved against the post-redirect URL. */
    private collectTargets(page: LoadedPage): { links: string[]; files: string[] } {
        const $ = page.document;
        const links: string[] = [];
        const files: string[] = [];

        $('a[href]').each((_, element) => {
            const href = ($(element).attr('href') ?? '').trim();
            const target = parseHttpUrl(href, page.finalUrl);
            if (!target) {
                return;
            }
            if (classifyTarget(target) === TargetKind.FILE) {
                files.push(target.href);
            } else {
                links.push(target.href);
            }
        });

        return { links, files };
    }
}
