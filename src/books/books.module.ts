import { Module } from '@nestjs/common';
import { TimeoutExecutor } from '../common/timeout/timeout-executor';
import { BooksController } from './books.controller';
import { BooksRepository } from './books.repository';
import { BooksService } from './books.service';

@Module({
  controllers: [BooksController],
  providers: [BooksRepository, BooksService, TimeoutExecutor],
})
export class BooksModule {}
