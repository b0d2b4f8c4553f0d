import { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import cookieParser from 'cookie-parser';
import { DEFAULT_CORS_ORIGINS } from './config/env.validation';
import { createValidationPipe } from './common/validation';

export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);
  const origins = configService
    .get<string>('CORS_ORIGINS', DEFAULT_CORS_ORIGINS)
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  app.use(cookieParser());
  app.useGlobalPipes(createValidationPipe());

  app.enableCors({
    origin: origins,
    methods: 'GET,HEAD,POST',
    credentials: true,
  });
}
