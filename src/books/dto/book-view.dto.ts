import { Flash } from '../../common/flash';
import { Page } from '../../common/page';
import { Book, formatDate } from '../book.model';

export interface BookView {
  id: number;
  name: string;
  author: string;
  publishDate: string;
  description: string;
}

export interface BookListView {
  books: BookView[];
  page: number;
  offset: number;
  total: number;
  prev: number | null;
  next: number | null;
  orderBy: number;
  filter: string;
}

export interface BookListResponse extends BookListView {
  flash: Flash | null;
}

export interface BookFormFields {
  name: string;
  author: string;
  publishDate: string;
  description: string;
}

export interface BookFormView {
  id?: number;
  form: BookFormFields;
}

export function toBookView(book: Book): BookView {
  return {
    id: book.id,
    name: book.name,
    author: book.author,
    publishDate: formatDate(book.publishDate),
    description: book.description,
  };
}

export function toListView(page: Page<Book>, orderBy: number, filter: string): BookListView {
  return {
    books: page.items.map(toBookView),
    page: page.page,
    offset: page.offset,
    total: page.total,
    prev: page.prev ?? null,
    next: page.next ?? null,
    orderBy,
    filter,
  };
}
