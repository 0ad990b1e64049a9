import { GoneException, Injectable, Logger, NotFoundException, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { VIEW_DEFAULTS } from '../config/env.validation';
import { ProbeResult } from '../interfaces/report.interface';
import { ResultPaginator } from '../pagination/result-paginator';

export interface ViewPage {
    id: string;
    base: string;
    page: number;
    pageCount: number;
    totalFound: number;
    text: string;
}

interface DiscoveryView {
    id: string;
    base: string;
    paginator: ResultPaginator<ProbeResult>;
    frozen: boolean;
    timer: NodeJS.Timeout | null;
}

export function formatProbeLine(base: string, probe: ProbeResult): string {
    let path = probe.url;
    if (probe.url === base) {
        path = '/';
    } else if (probe.url.startsWith(`${base}/`)) {
        path = probe.url.slice(base.length);
    }
    return `\`${path}\` → ${probe.status}`;
}

/**
 * Paginated discovery results, one view per discovery call.
 *
 * Navigation keeps a view alive; after the idle timeout it freezes and rejects
 * further navigation with 410. The oldest views are evicted past `VIEW_MAX_OPEN`.
 */
@Injectable()
export class DiscoveryViewStore implements OnModuleDestroy {
    private readonly logger = new Logger(DiscoveryViewStore.name);
    private readonly views = new Map<string, DiscoveryView>();
    private readonly pageSize: number;
    private readonly idleTimeoutMs: number;
    private readonly maxOpen: number;

    constructor(private readonly configService: ConfigService) {
        this.pageSize = this.configService.get<number>('VIEW_PAGE_SIZE', VIEW_DEFAULTS.pageSize);
        this.idleTimeoutMs = this.configService.get<number>('VIEW_IDLE_TIMEOUT_MS', VIEW_DEFAULTS.idleTimeoutMs);
        this.maxOpen = this.configService.get<number>('VIEW_MAX_OPEN', VIEW_DEFAULTS.maxOpen);
    }

    get size(): number {
        return this.views.size;
    }

    open(base: string, found: ProbeResult[]): ViewPage {
        const view: DiscoveryView = {
            id: uuidv4(),
            base,
            paginator: new ResultPaginator(found, this.pageSize, (probe) => formatProbeLine(base, probe)),
            frozen: false,
            timer: null,
        };
        this.views.set(view.id, view);
        this.touch(view);
        this.evictOverflow();

        this.logger.log(`Opened view ${view.id} for ${base} (${found.length} results)`);
        return this.render(view);
    }

    show(id: string): ViewPage {
        const view = this.active(id);
        this.touch(view);
        return this.render(view);
    }

    next(id: string): ViewPage {
        const view = this.active(id);
        view.paginator.advance();
        this.touch(view);
        return this.render(view);
    }

    previous(id: string): ViewPage {
        const view = this.active(id);
        view.paginator.retreat();
        this.touch(view);
        return this.render(view);
    }

    onModuleDestroy(): void {
        for (const view of this.views.values()) {
            this.clearTimer(view);
        }
        this.views.clear();
    }

    private active(id: string): DiscoveryView {
        const view = this.views.get(id);
        if (!view) {
            throw new NotFoundException(`Discovery view '${id}' not found`);
        }
        if (view.frozen) {
            throw new GoneException(`Discovery view '${id}' has expired`);
        }
        return view;
    }

    private touch(view: DiscoveryView): void {
        this.clearTimer(view);
        view.timer = setTimeout(() => this.freeze(view), this.idleTimeoutMs);
        view.timer.unref();
    }

    private freeze(view: DiscoveryView): void {
        view.frozen = true;
        view.timer = null;
        this.logger.debug(`View ${view.id} frozen after ${this.idleTimeoutMs} ms idle`);
    }

    private clearTimer(view: DiscoveryView): void {
        if (view.timer) {
            clearTimeout(view.timer);
            view.timer = null;
        }
    }

    private evictOverflow(): void {
        for (const view of this.views.values()) {
            if (this.views.size <= this.maxOpen) {
                return;
            }
            this.clearTimer(view);
            this.views.delete(view.id);
        }
    }

    private render(view: DiscoveryView): ViewPage {
        const { paginator } = view;
        return {
            id: view.id,
            base: view.base,
            page: paginator.currentPage + 1,
            pageCount: Math.max(paginator.maxPages, 1),
            totalFound: paginator.totalItems,
            text: paginator.currentPageText(),
        };
    }
}
