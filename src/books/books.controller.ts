import {
  Body,
  Controller,
  Get,
  HttpStatus,
  Param,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { Flash, setFlash, takeFlash } from '../common/flash';
import { ParseIdPipe } from '../common/parse-id.pipe';
import { BooksService } from './books.service';
import { BookFormDto } from './dto/book-form.dto';
import { BookFormView, BookListResponse, BookListView, BookView } from './dto/book-view.dto';
import { ListQueryDto } from './dto/list-query.dto';

export const BOOKS_HOME = '/books';

@Controller('books')
export class BooksController {
  constructor(private readonly booksService: BooksService) {}

  @Get()
  async list(
    @Query() query: ListQueryDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BookListResponse> {
    const view = await this.booksService.listBooks(query);
    return this.withFlash(view, req, res);
  }

  @Get('sync')
  async listBlocking(
    @Query() query: ListQueryDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BookListResponse> {
    const view = await this.booksService.listBooksBlocking(query);
    return this.withFlash(view, req, res);
  }

  @Get('cached')
  async listCached(
    @Query() query: ListQueryDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BookListResponse> {
    const view = await this.booksService.listBooksCached('asynchronous', query);
    return this.withFlash(view, req, res);
  }

  @Get('cached/sync')
  async listCachedBlocking(
    @Query() query: ListQueryDto,
    @Req() req: Request,
    @Res({ passthrough: true }) res: Response,
  ): Promise<BookListResponse> {
    const view = await this.booksService.listBooksCached('synchronous', query);
    return this.withFlash(view, req, res);
  }

  @Get('all')
  findAll(): Promise<BookView[]> {
    return this.booksService.findAll();
  }

  @Get('new')
  createForm(): BookFormView {
    return this.booksService.getCreateForm();
  }

  @Post()
  async create(@Body() form: BookFormDto, @Res() res: Response): Promise<void> {
    const flash = await this.booksService.create(form);
    this.redirectHome(res, flash);
  }

  @Get(':id/edit')
  editForm(@Param('id', ParseIdPipe) id: number): Promise<BookFormView> {
    return this.booksService.getEditForm(id);
  }

  @Post(':id')
  async update(
    @Param('id', ParseIdPipe) id: number,
    @Body() form: BookFormDto,
    @Res() res: Response,
  ): Promise<void> {
    const flash = await this.booksService.update(id, form);
    this.redirectHome(res, flash);
  }

  @Post(':id/delete')
  async remove(@Param('id', ParseIdPipe) id: number, @Res() res: Response): Promise<void> {
    const flash = await this.booksService.remove(id);
    this.redirectHome(res, flash);
  }

  private withFlash(view: BookListView, req: Request, res: Response): BookListResponse {
    return { ...view, flash: takeFlash(req, res) ?? null };
  }

  private redirectHome(res: Response, flash: Flash): void {
    setFlash(res, flash);
    res.redirect(HttpStatus.SEE_OTHER, BOOKS_HOME);
  }
}
