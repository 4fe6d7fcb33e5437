import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '@collaborators/collaborators.module';
import { MoviesModule } from '@movies/movies.module';
import { OutboxModule } from '@outbox/outbox.module';
import { PlatformModule } from '@platform/platform.module';
import { PublicationsModule } from '@publications/publications.module';
import { SubmissionsModule } from '@submissions/submissions.module';

@Module({
  imports: [
    PlatformModule,
    CollaboratorsModule,
    MoviesModule,
    OutboxModule,
    SubmissionsModule,
    PublicationsModule,
  ],
})
export class AppModule {}
