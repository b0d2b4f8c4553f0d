/**
 * One page of a filtered result set.
 *
 * `offset` is the number of rows skipped before `items` (`page * pageSize`)
 * and `total` the number of rows matching the filter across all pages.
 */
export class Page<T> {
  constructor(
    readonly items: T[],
    readonly page: number,
    readonly offset: number,
    readonly total: number,
  ) {}

  get prev(): number | undefined {
    const prev = this.page - 1;
    return prev >= 0 ? prev : undefined;
  }

  get next(): number | undefined {
    return this.offset + this.items.length < this.total ? this.page + 1 : undefined;
  }
}
