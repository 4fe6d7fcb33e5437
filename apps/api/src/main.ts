import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  app.enableShutdownHooks();
  new Logger('Bootstrap').log('Workflow engine started; outbox worker running');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Workflow engine failed to start',
    error instanceof Error ? error.stack : String(error)
  );
  process.exit(1);
});
