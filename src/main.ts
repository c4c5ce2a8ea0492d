import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe, VersioningType } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import type { NextFunction, Request, Response } from 'express';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('HTTP');

  // Enable API versioning (URI-based: /v1/rag/*)
  app.enableVersioning({
    type: VersioningType.URI,
    defaultVersion: '1',
  });

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const { method, originalUrl } = req;
    const start = Date.now();

    res.on('finish', () => {
      const { statusCode } = res;
      const duration = Date.now() - start;
      logger.log(`${method} ${originalUrl} ${statusCode} - ${duration}ms`);
    });

    next();
  });

  // Enable CORS with whitelist
  const allowedOrigins = [
    'http://localhost:3000',
    'http://localhost:3001',
    'http://localhost:8080',
    process.env.FRONTEND_URL,
  ].filter((origin): origin is string => Boolean(origin));

  app.enableCors({
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) return callback(null, true);
      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('CORS policy violation'));
      }
    },
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Setup Swagger
  const config = new DocumentBuilder()
    .setTitle('Corpus Chat API')
    .setDescription(
      'Retrieval-augmented chat over a local document folder.\n\n1. Load documents via `POST /v1/rag/documents/load`\n2. Ask questions via `POST /v1/rag/chat`\n3. Inspect the LLM connection via `GET /v1/llm/health` and `GET /v1/llm/models`',
    )
    .setVersion('1.0')
    .addTag('rag', 'Retrieval and chat operations')
    .addTag('llm', 'LLM service connectivity and models')
    .build();
  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api', app, document);

  const port = process.env.PORT || 3001;
  await app.listen(port);

  logger.log(`🚀 Corpus chat backend running on http://localhost:${port}`);
  logger.log(`📖 Swagger API docs available at http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`❌ Failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
