import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, ValidationPipe } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { apiReference } from '@scalar/nestjs-api-reference';
import compression from 'compression';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { GlobalExceptionFilter } from './common/filters/global-exception.filter';

async function bootstrap() {
  // rawBody: webhook signatures are checked against the exact bytes received
  const app = await NestFactory.create(AppModule, { rawBody: true });

  app.use(helmet({ contentSecurityPolicy: false }));

  app.use(compression());

  // Strips unknown fields and converts query/path params to the DTO types
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  app.useGlobalFilters(new GlobalExceptionFilter());

  // SIGTERM: finish in-flight requests, then close the pool
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle('Storefront Signals API')
    .setDescription(
      'Backend of a commerce-platform app. Verifies signed webhooks and answers privacy requests, ' +
        'ingests storefront events from the web pixel, and runs customer/product/order pulls in the background.',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api-json', app, document, { jsonDocumentUrl: '/api-json' });

  app.use(
    '/docs',
    apiReference({
      spec: { content: document },
      theme: 'purple',
      pageTitle: 'Storefront Signals API',
    }),
  );

  const port = process.env.PORT || 8080;
  await app.listen(port);

  const logger = new Logger('Bootstrap');
  logger.log(`API running on http://localhost:${port}`);
  logger.log(`API docs → http://localhost:${port}/docs`);
}
bootstrap().catch((err) => {
  new Logger('Bootstrap').error(`Startup failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  process.exit(1);
});
