import { EMPTY_PAGE_TEXT, ResultPaginator } from './result-paginator';

describe('ResultPaginator', () => {
    const items = Array.from({ length: 23 }, (_, i) => i);
    let paginator: ResultPaginator<number>;

    beforeEach(() => {
        paginator = new ResultPaginator(items, 10, (item) => `item-${item}`);
    });

    it('should compute the number of pages', () => {
        expect(paginator.maxPages).toBe(3);
        expect(paginator.currentPage).toBe(0);
        expect(paginator.totalItems).toBe(23);
    });

    it('should not retreat before the first page', () => {
        expect(paginator.retreat()).toBe(false);
        expect(paginator.currentPage).toBe(0);
    });

    it('should expose items 10 to 19 on the second page', () => {
        expect(paginator.advance()).toBe(true);

        expect(paginator.currentPage).toBe(1);
        expect(paginator.currentItems()).toEqual(items.slice(10, 20));
    });

    it('should not advance past the last page', () => {
        paginator.advance();
        paginator.advance();

        expect(paginator.currentPage).toBe(2);
        expect(paginator.advance()).toBe(false);
        expect(paginator.currentPage).toBe(2);
        expect(paginator.currentItems()).toEqual([20, 21, 22]);
    });

    it('should render the current window one item per line', () => {
        paginator.advance();
        paginator.advance();

        expect(paginator.currentPageText()).toBe('item-20\nitem-21\nitem-22');
    });

    it('should walk back after advancing', () => {
        paginator.advance();
        paginator.advance();

        expect(paginator.retreat()).toBe(true);
        expect(paginator.currentPage).toBe(1);
    });

    it('should render a single empty page without items', () => {
        const empty = new ResultPaginator<number>([], 10, String);

        expect(empty.maxPages).toBe(0);
        expect(empty.currentPage).toBe(0);
        expect(empty.currentPageText()).toBe(EMPTY_PAGE_TEXT);
        expect(empty.advance()).toBe(false);
        expect(empty.retreat()).toBe(false);
        expect(empty.currentPage).toBe(0);
    });

    it('should fill exactly one page when items match the page size', () => {
        const exact = new ResultPaginator(items.slice(0, 10), 10, String);

        expect(exact.maxPages).toBe(1);
        expect(exact.advance()).toBe(false);
    });

    it('should reject a non-positive page size', () => {
        expect(() => new ResultPaginator(items, 0, String)).toThrow(RangeError);
    });
});
