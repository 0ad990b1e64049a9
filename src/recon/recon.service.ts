import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { DirectoryAnalyzerService } from '../analyzer/directory-analyzer.service';
import { DiscoveryService } from '../discovery/discovery.service';
import { PageExtractorService } from '../extractor/page-extractor.service';
import {
    AnalysisSuccess,
    ImagesSuccess,
    LinksSuccess,
    MetaSuccess,
    ProbeResult,
    TextSuccess,
    TitleSuccess,
} from '../interfaces/report.interface';
import { originOf } from '../utils/url.util';
import { DiscoveryViewStore, ViewPage } from './discovery-view.store';
import { unwrapReport } from './failure.mapper';

export interface DiscoveryResponse {
    base: string;
    checked: number;
    totalFound: number;
    found: ProbeResult[];
    view: ViewPage;
}

@Injectable()
export class ReconService {
    private readonly logger = new Logger(ReconService.name);

    constructor(
        private readonly discoveryService: DiscoveryService,
        private readonly analyzerService: DirectoryAnalyzerService,
        private readonly extractorService: PageExtractorService,
        private readonly viewStore: DiscoveryViewStore,
    ) { }

    /**
     * Probes the origin of `url` and opens a paginated view over what was found.
     */
    async discover(url: string): Promise<DiscoveryResponse> {
        const origin = originOf(url);
        if (!origin) {
            throw new BadRequestException('Invalid URL.');
        }

        const report = unwrapReport(await this.discoveryService.discover(origin));
        const view = this.viewStore.open(report.base, report.found);
        this.logger.log(`Discovery for ${report.base}: ${report.found.length} of ${report.checked} paths found`);

        return {
            base: report.base,
            checked: report.checked,
            totalFound: report.found.length,
            found: report.found,
            view,
        };
    }

    async analyze(url: string): Promise<AnalysisSuccess> {
        return unwrapReport(await this.analyzerService.analyze(url));
    }

    async title(url: string): Promise<TitleSuccess> {
        return unwrapReport(await this.extractorService.title(url));
    }

    async links(url: string): Promise<LinksSuccess> {
        return unwrapReport(await this.extractorService.links(url));
    }

    async images(url: string): Promise<ImagesSuccess> {
        return unwrapReport(await this.extractorService.images(url));
    }

    async meta(url: string): Promise<MetaSuccess> {
        return unwrapReport(await this.extractorService.metaDescription(url));
    }

    async text(url: string, maxChars?: number): Promise<TextSuccess> {
        return unwrapReport(await this.extractorService.textSnippet(url, maxChars));
    }

    showView(id: string): ViewPage {
        return this.viewStore.show(id);
    }

    nextPage(id: string): ViewPage {
        return this.viewStore.next(id);
    }

    previousPage(id: string): ViewPage {
        return this.viewStore.previous(id);
    }
}
