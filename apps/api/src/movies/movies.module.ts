import { Module } from '@nestjs/common';
import { CollaboratorsModule } from '@collaborators/collaborators.module';
import { MovieFileIngestService } from './application/movie-file-ingest.service';

@Module({
  imports: [CollaboratorsModule],
  providers: [MovieFileIngestService],
  exports: [MovieFileIngestService],
})
export class MoviesModule {}
