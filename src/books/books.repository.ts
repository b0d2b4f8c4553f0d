import { Injectable, Logger } from '@nestjs/common';
import { Page } from '../common/page';
import { DEFAULT_PAGE_SIZE } from '../config/env.validation';
import { DatabaseError } from '../database/database.error';
import { DatabaseService } from '../database/database.service';
import { Book, BookInput, isBookRow, toBook } from './book.model';
import { DEFAULT_ORDER_BY, resolveSortOrder } from './book-sort';

export interface ListOptions {
  page?: number;
  pageSize?: number;
  /** 1-based column index, negative for descending. */
  orderBy?: number;
  /** LIKE pattern matched against the name; callers add the wildcards. */
  filter?: string;
}

type BookParams = {
  name: string;
  author: string;
  publishDate: string;
  description: string;
};

function toParams(book: BookInput): BookParams {
  return {
    name: book.name,
    author: book.author,
    publishDate: book.publishDate.toISOString(),
    description: book.description,
  };
}

function readBook(value: unknown): Book {
  if (!isBookRow(value)) {
    throw new DatabaseError('Unexpected row shape in the book table');
  }
  return toBook(value);
}

function readTotal(value: unknown): number {
  if (typeof value === 'object' && value !== null && 'total' in value && typeof value.total === 'number') {
    return value.total;
  }
  return 0;
}

@Injectable()
export class BooksRepository {
  private readonly logger = new Logger(BooksRepository.name);

  constructor(private readonly database: DatabaseService) {}

  async findById(id: number): Promise<Book | undefined> {
    const row = await this.database.get('SELECT * FROM book WHERE id = ?', [id]);

    return row === undefined ? undefined : readBook(row);
  }

  async list({
    page = 0,
    pageSize = DEFAULT_PAGE_SIZE,
    orderBy = DEFAULT_ORDER_BY,
    filter = '%',
  }: ListOptions = {}): Promise<Page<Book>> {
    const { column, direction } = resolveSortOrder(orderBy);
    const offset = pageSize * page;

    const rows = await this.database.all(
      `SELECT * FROM book
       WHERE book.name LIKE @filter
       ORDER BY ${column} ${direction} NULLS LAST
       LIMIT @pageSize OFFSET @offset`,
      { filter, pageSize, offset },
    );

    const count = await this.database.get(
      'SELECT COUNT(*) AS total FROM book WHERE book.name LIKE @filter',
      { filter },
    );

    return new Page(rows.map(readBook), page, offset, readTotal(count));
  }

  /** Every book ordered by name. Failures are logged and yield an empty list. */
  async findAll(): Promise<Book[]> {
    try {
      const rows = await this.database.all('SELECT * FROM book ORDER BY name');
      return rows.map(readBook);
    } catch (error) {
      this.logger.error('Failed to load books', error instanceof Error ? error.stack : undefined);
      return [];
    }
  }

  async update(id: number, book: BookInput): Promise<number> {
    const result = await this.database.run(
      `UPDATE book
       SET name = @name, author = @author, publish_date = @publishDate, description = @description
       WHERE id = @id`,
      { id, ...toParams(book) },
    );

    return result.changes;
  }

  /** Id of the new row. Ids past `Number.MAX_SAFE_INTEGER` are refused, since they cannot round-trip. */
  async insert(book: BookInput): Promise<number | undefined> {
    const result = await this.database.run(
      `INSERT INTO book (name, author, publish_date, description)
       VALUES (@name, @author, @publishDate, @description)`,
      toParams(book),
    );

    if (result.changes === 0) {
      return undefined;
    }

    const id = Number(result.lastInsertRowid);
    if (!Number.isSafeInteger(id)) {
      throw new RangeError(`Book id ${result.lastInsertRowid} is beyond the supported id range`);
    }
    return id;
  }

  async delete(id: number): Promise<number> {
    const result = await this.database.run('DELETE FROM book WHERE id = ?', [id]);

    return result.changes;
  }
}
