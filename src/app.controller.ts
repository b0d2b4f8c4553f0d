import { Controller, Get, HttpStatus, Redirect } from '@nestjs/common';
import { BOOKS_HOME } from './books/books.controller';

@Controller()
export class AppController {
  @Get()
  @Redirect(BOOKS_HOME, HttpStatus.SEE_OTHER)
  index(): void {}
}
