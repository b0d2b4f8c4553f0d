import {
  HttpException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TtlCache } from '../common/cache/ttl-cache';
import { Flash } from '../common/flash';
import { OperationTimeoutError } from '../common/timeout/operation-timeout.error';
import { TimeoutExecutor } from '../common/timeout/timeout-executor';
import {
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SYNC_CACHE_TTL_MS,
} from '../config/env.validation';
import { BookInput, formatDate, parseFormDate } from './book.model';
import { DEFAULT_ORDER_BY } from './book-sort';
import { BooksRepository } from './books.repository';
import { BookFormDto } from './dto/book-form.dto';
import { BookFormView, BookListView, BookView, toBookView, toListView } from './dto/book-view.dto';
import { ListQueryDto } from './dto/list-query.dto';

export type CachedListVariant = 'asynchronous' | 'synchronous';

interface ListParams {
  page: number;
  orderBy: number;
  filter: string;
}

function toBookInput(form: BookFormDto): BookInput {
  return {
    name: form.name,
    author: form.author,
    publishDate: parseFormDate(form.publishDate),
    description: form.description,
  };
}

@Injectable()
export class BooksService {
  private readonly logger = new Logger(BooksService.name);
  private readonly pageSize: number;
  private readonly caches: Record<CachedListVariant, TtlCache<BookListView>>;

  constructor(
    private readonly repository: BooksRepository,
    private readonly executor: TimeoutExecutor,
    private readonly configService: ConfigService,
  ) {
    this.pageSize = this.configService.get<number>('BOOKS_PAGE_SIZE', DEFAULT_PAGE_SIZE);
    const maxEntries = this.configService.get<number>('BOOKS_CACHE_MAX_ENTRIES', DEFAULT_CACHE_MAX_ENTRIES);
    this.caches = {
      asynchronous: new TtlCache<BookListView>(
        this.configService.get<number>('BOOKS_CACHE_ASYNC_TTL_MS'),
        maxEntries,
      ),
      synchronous: new TtlCache<BookListView>(
        this.configService.get<number>('BOOKS_CACHE_SYNC_TTL_MS', DEFAULT_SYNC_CACHE_TTL_MS),
        maxEntries,
      ),
    };
  }

  /** Lists a page of books, failing with a 500 if the store misses its deadline. */
  async listBooks(query: ListQueryDto): Promise<BookListView> {
    const params = this.normalize(query);

    try {
      return await this.executor.run(() => this.fetchPage(params));
    } catch (error) {
      this.handleError(error, 'list');
    }
  }

  /** Lists a page of books by calling the store directly, with no deadline. */
  async listBooksBlocking(query: ListQueryDto): Promise<BookListView> {
    const params = this.normalize(query);

    try {
      return await this.fetchPage(params);
    } catch (error) {
      this.handleError(error, 'list');
    }
  }

  /**
   * Same as {@link listBooks} (`asynchronous`) or {@link listBooksBlocking}
   * (`synchronous`), memoized per variant and query.
   */
  async listBooksCached(variant: CachedListVariant, query: ListQueryDto): Promise<BookListView> {
    const params = this.normalize(query);
    const cacheKey = this.buildCacheKey(variant, params);
    const cache = this.caches[variant];

    const cached = cache.get(cacheKey);
    if (cached) {
      this.logger.debug(`Cache hit for ${cacheKey}`);
      return cached;
    }

    const view =
      variant === 'asynchronous' ? await this.listBooks(params) : await this.listBooksBlocking(params);
    cache.set(cacheKey, view);
    return view;
  }

  async findAll(): Promise<BookView[]> {
    const books = await this.repository.findAll();
    return books.map(toBookView);
  }

  async getEditForm(id: number): Promise<BookFormView> {
    try {
      const book = await this.executor.run(() => this.repository.findById(id));
      if (!book) {
        throw new NotFoundException(`Book ${id} not found`);
      }

      return {
        id,
        form: {
          name: book.name,
          author: book.author,
          publishDate: formatDate(book.publishDate),
          description: book.description,
        },
      };
    } catch (error) {
      this.handleError(error, 'edit');
    }
  }

  getCreateForm(): BookFormView {
    return { form: { name: '', author: '', publishDate: '', description: '' } };
  }

  async update(id: number, form: BookFormDto): Promise<Flash> {
    const book = toBookInput(form);

    try {
      const updated = await this.executor.run(() => this.repository.update(id, book));
      if (updated === 0) {
        return { type: 'error', message: `Book ${book.name} could not be found` };
      }
      return { type: 'success', message: `Book ${book.name} has been updated` };
    } catch (error) {
      return this.handleWriteError(error, 'update', `Book ${book.name} has not been updated`);
    }
  }

  async create(form: BookFormDto): Promise<Flash> {
    const book = toBookInput(form);

    try {
      const bookId = await this.executor.run(() => this.repository.insert(book));
      if (bookId === undefined) {
        const message = `Book ${book.name} has not been created`;
        this.logger.log(message);
        return { type: 'error', message };
      }

      const message = `Book ${book.name} has been created`;
      this.logger.log(`${message} with id ${bookId}`);
      return { type: 'success', message };
    } catch (error) {
      return this.handleWriteError(error, 'create', `Book ${book.name} has not been created`);
    }
  }

  async remove(id: number): Promise<Flash> {
    try {
      const deleted = await this.executor.run(() => this.repository.delete(id));
      if (deleted === 0) {
        return { type: 'error', message: 'Book could not be found' };
      }
      return { type: 'success', message: 'Book has been deleted' };
    } catch (error) {
      return this.handleWriteError(error, 'delete', 'Book has not been deleted');
    }
  }

  private async fetchPage({ page, orderBy, filter }: ListParams): Promise<BookListView> {
    const result = await this.repository.list({
      page,
      pageSize: this.pageSize,
      orderBy,
      filter: `%${filter}%`,
    });

    return toListView(result, orderBy, filter);
  }

  private normalize(query: ListQueryDto): ListParams {
    return {
      page: query.page ?? 0,
      orderBy: query.orderBy ?? DEFAULT_ORDER_BY,
      filter: query.filter ?? '',
    };
  }

  private buildCacheKey(variant: CachedListVariant, params: ListParams): string {
    return `${variant}:${JSON.stringify(params)}`;
  }

  private handleWriteError(error: unknown, operation: string, message: string): Flash {
    if (error instanceof OperationTimeoutError || error instanceof HttpException) {
      this.handleError(error, operation);
    }

    this.logger.error(
      `Failed to ${operation} book: ${error instanceof Error ? error.message : JSON.stringify(error)}`,
      error instanceof Error ? error.stack : undefined,
    );
    return { type: 'error', message };
  }

  private handleError(error: unknown, operation: string): never {
    if (error instanceof HttpException) {
      throw error;
    }

    if (error instanceof OperationTimeoutError) {
      this.logger.error(`Problem found in book ${operation} process`);
      throw new InternalServerErrorException(error.message);
    }

    if (error instanceof Error) {
      this.logger.error(`Failed to ${operation} books`, error.stack);
    } else {
      this.logger.error(`Failed to ${operation} books: ${JSON.stringify(error)}`);
    }

    throw new InternalServerErrorException(`Failed to ${operation} books`);
  }
}
