import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_DISCOVERY_STATUSES, parseStatusList } from '../config/env.validation';
import { HttpClientService } from '../http-client/http-client.service';
import { HeadResult } from '../interfaces/fetch.interface';
import { DiscoveryReport, ProbeResult } from '../interfaces/report.interface';
import { invalidUrl, parseHttpUrl, unexpectedFailure } from '../utils/url.util';
import { DISCOVERY_WORDLIST, probeCandidates, Wordlist } from './wordlist';

/** "https://example.com/" and "https://example.com" probe the same targets. */
export function normalizeBase(base: string): string {
    return base.replace(/\/+$/, '');
}

export function candidateUrls(base: string, words: readonly string[]): string[] {
    const normalized = normalizeBase(base);
    return words.map((word) => `${normalized}/${word}`);
}

@Injectable()
export class DiscoveryService {
    private readonly logger = new Logger(DiscoveryService.name);
    private readonly foundStatuses: ReadonlySet<number>;

    constructor(
        private readonly httpClient: HttpClientService,
        private readonly configService: ConfigService,
        @Inject(DISCOVERY_WORDLIST) private readonly wordlist: Wordlist,
    ) {
        this.foundStatuses = parseStatusList(
            this.configService.get<string>('DISCOVERY_STATUSES', DEFAULT_DISCOVERY_STATUSES),
        );
    }

    /**
     * Probes every wordlist entry under `base` with HEAD requests.
     *
     * Probes run concurrently behind the client's shared rate gate and are joined before
     * filtering, so one slow probe holds back the whole report. Failed probes are dropped;
     * `found` keeps wordlist order.
     */
    async discover(base: string): Promise<DiscoveryReport> {
        if (!parseHttpUrl(base)) {
            return invalidUrl(base);
        }

        try {
            const normalized = normalizeBase(base);
            const candidates = candidateUrls(normalized, probeCandidates(this.wordlist));
            this.logger.log(`Probing ${candidates.length} paths under ${normalized}`);

            const results = await Promise.all(candidates.map((candidate) => this.httpClient.head(candidate)));
            const found = results
                .map((result) => this.toProbe(result))
                .filter((probe): probe is ProbeResult => probe !== null);

            this.logger.log(`Discovery of ${normalized} finished: ${found.length}/${candidates.length} found`);
            return { ok: true, base: normalized, checked: candidates.length, found };
        } catch (error) {
            this.logger.error(`Discovery of ${base} failed`, error instanceof Error ? error.stack : String(error));
            return unexpectedFailure(base, error);
        }
    }

    private toProbe(result: HeadResult): ProbeResult | null {
        if (!result.ok) {
            this.logger.debug(`Probe ${result.url} failed: ${result.error}`);
            return null;
        }
        if (!this.foundStatuses.has(result.status)) {
            return null;
        }
        return {
            url: result.finalUrl,
            status: result.status,
            contentType: result.headers['content-type'] ?? '',
        };
    }
}
