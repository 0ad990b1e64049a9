export const EMPTY_PAGE_TEXT = '(none)';

/**
 * Fixed-size windows over an immutable item list.
 *
 * Only `advance` and `retreat` change state, and both stop at the ends. With no items
 * there are zero pages and the paginator stays on page 0, rendering "(none)".
 */
export class ResultPaginator<T> {
    private page = 0;
    readonly maxPages: number;

    constructor(
        private readonly items: readonly T[],
        readonly pageSize: number,
        private readonly formatLine: (item: T) => string,
    ) {
        if (!Number.isInteger(pageSize) || pageSize < 1) {
            throw new RangeError(`pageSize must be a positive integer, got ${pageSize}`);
        }
        this.maxPages = Math.ceil(items.length / pageSize);
    }

    get currentPage(): number {
        return this.page;
    }

    get totalItems(): number {
        return this.items.length;
    }

    currentItems(): T[] {
        const start = this.page * this.pageSize;
        return this.items.slice(start, start + this.pageSize);
    }

    currentPageText(): string {
        const lines = this.currentItems().map(this.formatLine);
        return lines.length > 0 ? lines.join('\n') : EMPTY_PAGE_TEXT;
    }

    /** @returns whether the page changed */
    advance(): boolean {
        if (this.page >= this.maxPages - 1) {
            return false;
        }
        this.page++;
        return true;
    }

    /** @returns whether the page changed */
    retreat(): boolean {
        if (this.page <= 0) {
            return false;
        }
        this.page--;
        return true;
    }
}
