import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '@collaborators/collaborators.module';
import { OutboxModule } from '@outbox/outbox.module';
import { ObsolescenceGraphService } from './application/obsolescence-graph.service';
import { PublicationHistoryService } from './application/publication-history.service';
import { SubmissionPublicationService } from './application/submission-publication.service';

@Module({
  imports: [CollaboratorsModule, OutboxModule],
  providers: [
    ObsolescenceGraphService,
    PublicationHistoryService,
    SubmissionPublicationService,
  ],
  exports: [
    ObsolescenceGraphService,
    PublicationHistoryService,
    SubmissionPublicationService,
  ],
})
export class PublicationsModule {}
