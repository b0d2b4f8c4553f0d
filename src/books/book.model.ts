export interface Book {
  id: number;
  name: string;
  author: string;
  publishDate: Date;
  description: string;
}

export type BookInput = Omit<Book, 'id'>;

/** Row shape of the `book` table. */
export interface BookRow {
  id: number;
  name: string;
  author: string;
  publish_date: string;
  description: string;
}

// CURRENT_TIMESTAMP writes `yyyy-MM-dd HH:mm:ss` in UTC without a zone marker.
const SQLITE_TIMESTAMP = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

export function parseStoredDate(value: string): Date {
  if (SQLITE_TIMESTAMP.test(value)) {
    return new Date(`${value.replace(' ', 'T')}Z`);
  }
  return new Date(value);
}

export function isBookRow(value: unknown): value is BookRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'author' in value &&
    typeof value.author === 'string' &&
    'publish_date' in value &&
    typeof value.publish_date === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

export function toBook(row: BookRow): Book {
  return {
    id: row.id,
    name: row.name,
    author: row.author,
    publishDate: parseStoredDate(row.publish_date),
    description: row.description,
  };
}

/** `yyyy-MM-dd` in UTC, the format forms exchange dates in. */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function parseFormDate(value: string): Date {
  return new Date(`${value}T00:00:00.000Z`);
}
