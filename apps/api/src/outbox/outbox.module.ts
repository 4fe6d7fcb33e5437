import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '@collaborators/collaborators.module';
import { OutboxDispatcher } from './application/outbox-dispatcher';
import { OutboxWorker } from './application/outbox-worker';

@Module({
  imports: [CollaboratorsModule],
  providers: [OutboxDispatcher, OutboxWorker],
  exports: [OutboxDispatcher],
})
export class OutboxModule {}
