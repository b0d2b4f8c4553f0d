import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { BooksModule } from './books/books.module';
import { validate } from './config/env.validation';
import { DatabaseModule } from './database/database.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate }), DatabaseModule, BooksModule],
  controllers: [AppController],
})
export class AppModule {}
