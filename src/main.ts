import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { HttpExceptionFilter } from './common/exceptions/http-exception.filter';
import { validationExceptionFactory } from './common/exceptions/validation-exception.factory';
import { Logger, LoggingInterceptor } from './common/interceptors/logging.interceptor';
import { API_PREFIX } from './system/route-catalog';
import { isAllowedOrigin } from './common/utils/cors';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const configService = app.get(ConfigService);
  Logger.setLevel(configService.getOrDefault('LOG_LEVEL', 'debug'));

  app.useGlobalPipes(
    new ValidationPipe({ transform: true, whitelist: true, exceptionFactory: validationExceptionFactory }),
  );
  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());

  app.setGlobalPrefix(API_PREFIX);

  // CORS_ORIGIN is a comma-separated allow list
  const allowedOrigins = configService
    .getOrDefault('CORS_ORIGIN', 'http://localhost:8080')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  const production = configService.isProduction;

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // non-browser clients send no origin
      if (!origin || isAllowedOrigin(origin, allowedOrigins, production)) return callback(null, true);
      return callback(new Error('Not allowed by CORS'));
    },
    methods: 'GET,HEAD,PUT,PATCH,POST,DELETE,OPTIONS',
    credentials: true,
  });

  const config = new DocumentBuilder()
    .setTitle('LMS Portal API')
    .setDescription('Accounts, classes, assignments, grades and attendance')
    .setVersion('1.0')
    .addBearerAuth()
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);

  const port = configService.getNumber('PORT', 5000);
  const host = configService.getOrDefault('HOST', '0.0.0.0');
  await app.listen(port, host);

  Logger.log(`API listening on http://${host}:${port}/${API_PREFIX}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  const trace = err instanceof Error ? (err.stack ?? err.message) : String(err);
  Logger.error('Failed to start', trace, 'Bootstrap');
  process.exitCode = 1;
});
