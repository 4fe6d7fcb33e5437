import { Kysely } from 'kysely';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import {
  MovieFileRepository,
  NewMovieFile,
  StoredMovieFile,
} from '../application/ports/movie-file-repository';

export class KyselyMovieFileRepository extends MovieFileRepository {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async store(file: NewMovieFile): Promise<number> {
    const { id } = await this.db
      .insertInto('workflow.movie_files')
      .values({
        file_name: file.fileName,
        content: Buffer.from(file.content),
        compression: 'zip',
        original_length: file.originalLength,
      })
      .returning('id')
      .executeTakeFirstOrThrow();
    return id;
  }

  async copy(sourceId: number, fileName: string): Promise<number> {
    const source = await this.findById(sourceId);
    if (!source) {
      throw new Error(`Movie file ${sourceId} does not exist`);
    }
    return this.store({
      fileName,
      content: source.content,
      originalLength: source.originalLength,
    });
  }

  async findById(id: number): Promise<StoredMovieFile | null> {
    const row = await this.db
      .selectFrom('workflow.movie_files')
      .select(['id', 'file_name', 'content', 'original_length', 'created_at'])
      .where('id', '=', id)
      .executeTakeFirst();
    if (!row) return null;
    return {
      id: row.id,
      fileName: row.file_name,
      content: new Uint8Array(row.content),
      originalLength: row.original_length,
      createdAt: new Date(row.created_at),
    };
  }
}
