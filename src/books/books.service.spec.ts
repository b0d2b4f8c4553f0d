import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { InternalServerErrorException, NotFoundException } from '@nestjs/common';
import { Page } from '../common/page';
import { TimeoutExecutor } from '../common/timeout/timeout-executor';
import { DatabaseService } from '../database/database.service';
import { Book } from './book.model';
import { BooksRepository } from './books.repository';
import { BooksService } from './books.service';
import { BookFormDto } from './dto/book-form.dto';

const dune: Book = {
  id: 1,
  name: 'Dune',
  author: 'Herbert',
  publishDate: new Date('1965-01-01T00:00:00.000Z'),
  description: 'Sci-fi',
};

const duneForm: BookFormDto = {
  name: 'Dune',
  author: 'Herbert',
  publishDate: '1965-01-01',
  description: 'Sci-fi',
};

// 200k rows named `Book <n>`: enough that a full scan and sort takes far longer than a few milliseconds.
const SEED_CATALOG = `
  WITH RECURSIVE seq(n) AS (SELECT 1 UNION ALL SELECT n + 1 FROM seq WHERE n < 200000)
  INSERT INTO book (name, author, publish_date, description)
  SELECT 'Book ' || n, 'Author', '1965-01-01T00:00:00.000Z', 'Description ' || n FROM seq`;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('BooksService', () => {
  const createModule = async (settings: Record<string, unknown> = {}) => {
    const repository = {
      findById: jest.fn(),
      list: jest.fn(),
      findAll: jest.fn(),
      update: jest.fn(),
      insert: jest.fn(),
      delete: jest.fn(),
    };

    const values: Record<string, unknown> = { BOOKS_OPERATION_TIMEOUT_MS: 30, ...settings };
    const configService = {
      get: jest.fn((key: string, fallback?: unknown) => values[key] ?? fallback),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BooksService,
        TimeoutExecutor,
        { provide: BooksRepository, useValue: repository },
        { provide: ConfigService, useValue: configService },
      ],
    }).compile();

    return { service: module.get(BooksService), repository };
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('listBooks', () => {
    it('wraps the filter in wildcards and renders the page', async () => {
      const { service, repository } = await createModule();
      repository.list.mockResolvedValue(new Page([dune], 0, 0, 1));

      const view = await service.listBooks({ filter: 'Dune' });

      expect(repository.list).toHaveBeenCalledWith({
        page: 0,
        pageSize: 10,
        orderBy: 1,
        filter: '%Dune%',
      });
      expect(view).toEqual({
        books: [
          { id: 1, name: 'Dune', author: 'Herbert', publishDate: '1965-01-01', description: 'Sci-fi' },
        ],
        page: 0,
        offset: 0,
        total: 1,
        prev: null,
        next: null,
        orderBy: 1,
        filter: 'Dune',
      });
    });

    it('uses the configured page size', async () => {
      const { service, repository } = await createModule({ BOOKS_PAGE_SIZE: 25 });
      repository.list.mockResolvedValue(new Page([], 2, 50, 60));

      const view = await service.listBooks({ page: 2, orderBy: -3 });

      expect(repository.list).toHaveBeenCalledWith({
        page: 2,
        pageSize: 25,
        orderBy: -3,
        filter: '%%',
      });
      expect(view.prev).toBe(1);
      expect(view.next).toBe(3);
    });

    it('answers with a 500 when the store misses the deadline', async () => {
      const { service, repository } = await createModule();
      repository.list.mockImplementation(async () => {
        await sleep(80);
        return new Page([dune], 0, 0, 1);
      });

      const attempt = service.listBooks({});

      await expect(attempt).rejects.toBeInstanceOf(InternalServerErrorException);
      await expect(attempt).rejects.toThrow('This operation timed out');
      await sleep(80);
    });

    it('answers with a 500 when the store fails', async () => {
      const { service, repository } = await createModule();
      repository.list.mockRejectedValue(new Error('disk I/O error'));

      await expect(service.listBooks({})).rejects.toThrow('Failed to list books');
    });
  });

  describe('listBooksBlocking', () => {
    it('calls the store without a deadline', async () => {
      const { service, repository } = await createModule();
      repository.list.mockImplementation(async () => {
        await sleep(60);
        return new Page([dune], 0, 0, 1);
      });

      const view = await service.listBooksBlocking({});

      expect(view.total).toBe(1);
    });
  });

  describe('listBooksCached', () => {
    it('reuses the rendered page for an identical query', async () => {
      const { service, repository } = await createModule();
      repository.list.mockResolvedValue(new Page([dune], 0, 0, 1));

      const first = await service.listBooksCached('asynchronous', { filter: 'Dune' });
      const second = await service.listBooksCached('asynchronous', { filter: 'Dune' });

      expect(repository.list).toHaveBeenCalledTimes(1);
      expect(second).toBe(first);
    });

    it('keeps separate entries per query and per variant', async () => {
      const { service, repository } = await createModule();
      repository.list.mockResolvedValue(new Page([dune], 0, 0, 1));

      await service.listBooksCached('asynchronous', { filter: 'Dune' });
      await service.listBooksCached('asynchronous', { filter: 'Ubik' });
      await service.listBooksCached('synchronous', { filter: 'Dune' });

      expect(repository.list).toHaveBeenCalledTimes(3);
    });

    it('expires synchronous entries after the configured ttl', async () => {
      let now = 1_000_000;
      jest.spyOn(Date, 'now').mockImplementation(() => now);

      const { service, repository } = await createModule({ BOOKS_CACHE_SYNC_TTL_MS: 5_000 });
      repository.list.mockResolvedValue(new Page([dune], 0, 0, 1));

      await service.listBooksCached('synchronous', {});
      now += 4_999;
      await service.listBooksCached('synchronous', {});
      expect(repository.list).toHaveBeenCalledTimes(1);

      now += 1;
      await service.listBooksCached('synchronous', {});
      expect(repository.list).toHaveBeenCalledTimes(2);
    });

    it('does not cache failures', async () => {
      const { service, repository } = await createModule();
      repository.list
        .mockRejectedValueOnce(new Error('disk I/O error'))
        .mockResolvedValueOnce(new Page([dune], 0, 0, 1));

      await expect(service.listBooksCached('asynchronous', {})).rejects.toBeInstanceOf(
        InternalServerErrorException,
      );
      const view = await service.listBooksCached('asynchronous', {});

      expect(view.total).toBe(1);
      expect(repository.list).toHaveBeenCalledTimes(2);
    });

    it('evicts the oldest query once the cache is full', async () => {
      const { service, repository } = await createModule({ BOOKS_CACHE_MAX_ENTRIES: 2 });
      repository.list.mockResolvedValue(new Page([dune], 0, 0, 1));

      for (const filter of ['a', 'b', 'c', 'a']) {
        await service.listBooksCached('asynchronous', { filter });
      }

      expect(repository.list).toHaveBeenCalledTimes(4);
    });
  });

  describe('findAll', () => {
    it('renders every book', async () => {
      const { service, repository } = await createModule();
      repository.findAll.mockResolvedValue([dune]);

      await expect(service.findAll()).resolves.toEqual([
        { id: 1, name: 'Dune', author: 'Herbert', publishDate: '1965-01-01', description: 'Sci-fi' },
      ]);
    });
  });

  describe('getEditForm', () => {
    it('fills the form from the stored book', async () => {
      const { service, repository } = await createModule();
      repository.findById.mockResolvedValue(dune);

      await expect(service.getEditForm(1)).resolves.toEqual({ id: 1, form: duneForm });
      expect(repository.findById).toHaveBeenCalledWith(1);
    });

    it('answers with a 404 for a missing book', async () => {
      const { service, repository } = await createModule();
      repository.findById.mockResolvedValue(undefined);

      await expect(service.getEditForm(404)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('getCreateForm', () => {
    it('starts from empty fields', async () => {
      const { service } = await createModule();

      expect(service.getCreateForm()).toEqual({
        form: { name: '', author: '', publishDate: '', description: '' },
      });
    });
  });

  describe('update', () => {
    it('stores the form and reports success', async () => {
      const { service, repository } = await createModule();
      repository.update.mockResolvedValue(1);

      const flash = await service.update(1, duneForm);

      expect(repository.update).toHaveBeenCalledWith(1, {
        name: 'Dune',
        author: 'Herbert',
        publishDate: new Date('1965-01-01T00:00:00.000Z'),
        description: 'Sci-fi',
      });
      expect(flash).toEqual({ type: 'success', message: 'Book Dune has been updated' });
    });

    it('reports an error when no row matched', async () => {
      const { service, repository } = await createModule();
      repository.update.mockResolvedValue(0);

      await expect(service.update(404, duneForm)).resolves.toEqual({
        type: 'error',
        message: 'Book Dune could not be found',
      });
    });

    it('turns store failures into an error message', async () => {
      const { service, repository } = await createModule();
      repository.update.mockRejectedValue(new Error('SQLITE_CONSTRAINT'));

      await expect(service.update(1, duneForm)).resolves.toEqual({
        type: 'error',
        message: 'Book Dune has not been updated',
      });
    });

    it('answers with a 500 on timeout', async () => {
      const { service, repository } = await createModule();
      repository.update.mockImplementation(async () => {
        await sleep(80);
        return 1;
      });

      await expect(service.update(1, duneForm)).rejects.toThrow('This operation timed out');
      await sleep(80);
    });
  });

  describe('create', () => {
    it('reports the created book', async () => {
      const { service, repository } = await createModule();
      repository.insert.mockResolvedValue(12);

      await expect(service.create(duneForm)).resolves.toEqual({
        type: 'success',
        message: 'Book Dune has been created',
      });
    });

    it('reports an error when the store returns no id', async () => {
      const { service, repository } = await createModule();
      repository.insert.mockResolvedValue(undefined);

      await expect(service.create(duneForm)).resolves.toEqual({
        type: 'error',
        message: 'Book Dune has not been created',
      });
    });

    it('turns store failures into an error message', async () => {
      const { service, repository } = await createModule();
      repository.insert.mockRejectedValue(new Error('SQLITE_FULL'));

      await expect(service.create(duneForm)).resolves.toEqual({
        type: 'error',
        message: 'Book Dune has not been created',
      });
    });
  });

  describe('remove', () => {
    it('reports a deleted book', async () => {
      const { service, repository } = await createModule();
      repository.delete.mockResolvedValue(1);

      await expect(service.remove(1)).resolves.toEqual({ type: 'success', message: 'Book has been deleted' });
      expect(repository.delete).toHaveBeenCalledWith(1);
    });

    it('reports an error for a missing book', async () => {
      const { service, repository } = await createModule();
      repository.delete.mockResolvedValue(0);

      await expect(service.remove(404)).resolves.toEqual({ type: 'error', message: 'Book could not be found' });
    });

    it('turns store failures into an error message', async () => {
      const { service, repository } = await createModule();
      repository.delete.mockRejectedValue(new Error('database is locked'));

      await expect(service.remove(1)).resolves.toEqual({ type: 'error', message: 'Book has not been deleted' });
    });
  });

  describe('with the SQLite store', () => {
    let module: TestingModule;
    let service: BooksService;
    let database: DatabaseService;

    beforeEach(async () => {
      const values: Record<string, unknown> = { DATABASE_PATH: ':memory:', BOOKS_OPERATION_TIMEOUT_MS: 5 };

      module = await Test.createTestingModule({
        providers: [
          BooksService,
          BooksRepository,
          DatabaseService,
          TimeoutExecutor,
          {
            provide: ConfigService,
            useValue: { get: jest.fn((key: string, fallback?: unknown) => values[key] ?? fallback) },
          },
        ],
      }).compile();
      await module.init();

      service = module.get(BooksService);
      database = module.get(DatabaseService);
      await database.run(SEED_CATALOG);
    });

    afterEach(async () => {
      await module.close();
    });

    it('answers with a 500 when a slow query misses the deadline', async () => {
      const attempt = service.listBooks({ orderBy: -5, filter: 'Book' });

      await expect(attempt).rejects.toBeInstanceOf(InternalServerErrorException);
      await expect(attempt).rejects.toThrow('This operation timed out');
    });

    it('lets the same query finish without a deadline', async () => {
      const view = await service.listBooksBlocking({ orderBy: -5, filter: 'Book' });

      expect(view.total).toBe(200_000);
      expect(view.books).toHaveLength(10);
      expect(view.books[0].name).toBe('Book 99999');
    });
  });
});
