import { Module } from '@nestjs/common';
import { DirectoryAnalyzerService } from '../analyzer/directory-analyzer.service';
import { DiscoveryService } from '../discovery/discovery.service';
import { DEFAULT_WORDLIST, DISCOVERY_WORDLIST } from '../discovery/wordlist';
import { PageExtractorService } from '../extractor/page-extractor.service';
import { HttpClientService } from '../http-client/http-client.service';
import { PageFetcherService } from '../page-fetcher/page-fetcher.service';
import { DiscoveryViewStore } from './discovery-view.store';
import { ReconController } from './recon.controller';
import { ReconService } from './recon.service';

@Module({
    controllers: [ReconController],
    providers: [
        HttpClientService,
        PageFetcherService,
        DiscoveryService,
        DirectoryAnalyzerService,
        PageExtractorService,
        DiscoveryViewStore,
        ReconService,
        {
            provide: DISCOVERY_WORDLIST,
            useValue: DEFAULT_WORDLIST,
        },
    ],
})
export class ReconModule { }
