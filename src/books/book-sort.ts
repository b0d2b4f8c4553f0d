/** Sortable columns, addressed by 1-based index. A negative index sorts descending. */
export const BOOK_COLUMNS = ['id', 'name', 'author', 'publish_date', 'description'] as const;

export type BookColumn = (typeof BOOK_COLUMNS)[number];

export const DEFAULT_ORDER_BY = 1;

export const ORDER_BY_VALUES: number[] = BOOK_COLUMNS.flatMap((_, index) => [index + 1, -(index + 1)]);

export class UnsupportedSortColumnError extends RangeError {
  constructor(readonly orderBy: number) {
    super(`Unsupported orderBy column index: ${orderBy}`);
    this.name = 'UnsupportedSortColumnError';
  }
}

export interface SortOrder {
  column: BookColumn;
  direction: 'ASC' | 'DESC';
}

export function resolveSortOrder(orderBy: number): SortOrder {
  const column = Number.isInteger(orderBy) ? BOOK_COLUMNS[Math.abs(orderBy) - 1] : undefined;

  if (column === undefined) {
    throw new UnsupportedSortColumnError(orderBy);
  }

  return { column, direction: orderBy > 0 ? 'ASC' : 'DESC' };
}
