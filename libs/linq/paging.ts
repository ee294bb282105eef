/**
 * Paging over an in-memory result list.
 *
 * `take === -1` disables paging: the page is everything from `skip` on.
 * The source list is kept as a field so masking a Paging masks its elements,
 * and `result` always reflects the (masked) source.
 */
export class Paging<T> {
    private skipCount: number;
    private readonly takeCount: number;
    readonly source: T[];

    constructor(source: readonly T[], skip: number, take: number) {
        this.source = [...source];
        this.skipCount = skip;
        this.takeCount = take;
    }

    /** Index of the first element on the current page */
    get skip(): number {
        return this.skipCount;
    }

    /** Page size, -1 when not paging */
    get take(): number {
        return this.takeCount;
    }

    get totalCount(): number {
        return this.source.length;
    }

    get currentPageIndex(): number {
        if (this.takeCount === -1) return 0;
        return Math.floor(this.skipCount / this.takeCount);
    }

    get totalPageCount(): number {
        if (this.takeCount === -1) return 1;
        return Math.ceil(this.totalCount / this.takeCount);
    }

    get hasPreviousPage(): boolean {
        return this.currentPageIndex > 0;
    }

    get hasNextPage(): boolean {
        return this.currentPageIndex < this.totalPageCount - 1;
    }

    get result(): T[] {
        if (this.takeCount === -1) return this.source.slice(this.skipCount);
        return this.source.slice(this.skipCount, this.skipCount + this.takeCount);
    }

    /**
     * Move to a page index. Returns false and stays put when the page does not exist.
     */
    moveToPage(pageIndex: number): boolean {
        if (this.takeCount === -1 && pageIndex !== 0) {
            return false;
        }

        const newSkip = this.takeCount === -1 ? 0 : this.takeCount * pageIndex;
        if (newSkip < 0 || newSkip >= this.totalCount) return false;

        this.skipCount = newSkip;
        return true;
    }

    /**
     * New Paging positioned on a page index, or null when the page does not exist.
     * Without paging every index maps to page 0.
     */
    getMoveToPage(pageIndex: number): Paging<T> | null {
        const newSkip = this.takeCount === -1 ? 0 : this.takeCount * pageIndex;
        if (newSkip < 0 || newSkip >= this.totalCount) return null;

        return new Paging(this.source, newSkip, this.takeCount);
    }

    /**
     * Move forward or back by a number of pages.
     */
    movePage(deltaPageCount: number): boolean {
        if (this.takeCount === -1 && deltaPageCount !== 0) {
            return false;
        }

        const newSkip = this.skipCount + this.takeCount * deltaPageCount;
        if (newSkip < 0 || newSkip >= this.totalCount) return false;

        this.skipCount = newSkip;
        return true;
    }

    getMovePage(deltaPageCount: number): Paging<T> | null {
        if (this.takeCount === -1 && deltaPageCount !== 0) {
            return null;
        }

        const newSkip = this.skipCount + this.takeCount * deltaPageCount;
        if (newSkip < 0 || newSkip >= this.totalCount) return null;

        return new Paging(this.source, newSkip, this.takeCount);
    }

    reset(): void {
        this.moveToPage(0);
    }

    toJSON() {
        return {
            skip: this.skip,
            take: this.take,
            totalCount: this.totalCount,
            currentPageIndex: this.currentPageIndex,
            totalPageCount: this.totalPageCount,
            hasPreviousPage: this.hasPreviousPage,
            hasNextPage: this.hasNextPage,
            result: this.result
        };
    }
}
