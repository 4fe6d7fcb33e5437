import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '@collaborators/collaborators.module';
import { MoviesModule } from '@movies/movies.module';
import { OutboxModule } from '@outbox/outbox.module';
import { SubmissionAuthorizationService } from './application/submission-authorization.service';
import { SubmissionClaimService } from './application/submission-claim.service';
import { SubmissionService } from './application/submission.service';

@Module({
  imports: [CollaboratorsModule, MoviesModule, OutboxModule],
  providers: [
    SubmissionAuthorizationService,
    SubmissionClaimService,
    SubmissionService,
  ],
  exports: [
    SubmissionAuthorizationService,
    SubmissionClaimService,
    SubmissionService,
  ],
})
export class SubmissionsModule {}
