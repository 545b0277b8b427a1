import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WorkerModule } from './worker/worker.module';

async function bootstrap() {
  // No HTTP listener: this process only consumes the pull queue
  const app = await NestFactory.createApplicationContext(WorkerModule);

  // SIGTERM lets the running batch finish before the pool closes
  app.enableShutdownHooks();

  new Logger('Worker').log('Pull worker started');
}
bootstrap().catch((err) => {
  new Logger('Worker').error(`Startup failed: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  process.exit(1);
});
