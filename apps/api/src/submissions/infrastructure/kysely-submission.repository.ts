import { Kysely, Selectable } from 'kysely';
import {
  isHashType,
  isMovieStartType,
  parseSubmissionStatus,
  type NewSubmission,
  type Submission,
  type SubmissionAuthor,
} from '@tasflow/domain';
import { ConcurrencyConflictError } from '@platform/application/errors';
import type {
  SubmissionsTable,
  WorkflowDatabase,
} from '@platform/infrastructure/database/database.types';
import { SubmissionRepository } from '../application/ports/submission-repository';

type SubmissionColumns = Omit<
  Selectable<SubmissionsTable>,
  'id' | 'version' | 'created_at' | 'updated_at' | 'cycle_count'
> & { cycle_count: number | null };

const toColumns = (submission: NewSubmission): SubmissionColumns => ({
  status: submission.status,
  title: submission.title,
  submitter_id: submission.submitterId,
  judge_id: submission.judgeId,
  publisher_id: submission.publisherId,
  additional_authors: submission.additionalAuthors,
  game_name: submission.gameName,
  submitted_game_version: submission.submittedGameVersion,
  branch: submission.branch,
  rom_name: submission.romName,
  emulator_version: submission.emulatorVersion,
  encode_embed_link: submission.encodeEmbedLink,
  game_id: submission.gameId,
  game_version_id: submission.gameVersionId,
  game_goal_id: submission.gameGoalId,
  system_id: submission.systemId,
  system_frame_rate_id: submission.systemFrameRateId,
  intended_class_id: submission.intendedClassId,
  rejection_reason_id: submission.rejectionReasonId,
  movie_file_id: submission.movieFileId,
  movie_extension: submission.movieExtension,
  movie_start_type: submission.movieStartType,
  frames: submission.frames,
  rerecord_count: submission.rerecordCount,
  cycle_count: submission.cycleCount,
  annotations: submission.annotations,
  warnings: submission.warnings,
  hash_type: submission.hashType,
  hash: submission.hash,
  topic_id: submission.topicId,
  is_event_submission: submission.isEventSubmission,
});

const toSubmission = (
  row: Selectable<SubmissionsTable>,
  authors: readonly SubmissionAuthor[]
): Submission => {
  if (!isMovieStartType(row.movie_start_type)) {
    throw new Error(
      `Submission ${row.id} has an unknown start type: ${row.movie_start_type}`
    );
  }
  const hashType = row.hash_type;
  if (hashType !== null && !isHashType(hashType)) {
    throw new Error(`Submission ${row.id} has an unknown hash type: ${hashType}`);
  }
  return {
    id: row.id,
    version: row.version,
    status: parseSubmissionStatus(row.status),
    title: row.title,
    submitterId: row.submitter_id,
    judgeId: row.judge_id,
    publisherId: row.publisher_id,
    authors,
    additionalAuthors: row.additional_authors,
    gameName: row.game_name,
    submittedGameVersion: row.submitted_game_version,
    branch: row.branch,
    romName: row.rom_name,
    emulatorVersion: row.emulator_version,
    encodeEmbedLink: row.encode_embed_link,
    gameId: row.game_id,
    gameVersionId: row.game_version_id,
    gameGoalId: row.game_goal_id,
    systemId: row.system_id,
    systemFrameRateId: row.system_frame_rate_id,
    intendedClassId: row.intended_class_id,
    rejectionReasonId: row.rejection_reason_id,
    movieFileId: row.movie_file_id,
    movieExtension: row.movie_extension,
    movieStartType: row.movie_start_type,
    frames: row.frames,
    rerecordCount: row.rerecord_count,
    cycleCount: row.cycle_count === null ? null : Number(row.cycle_count),
    annotations: row.annotations,
    warnings: row.warnings,
    hashType,
    hash: row.hash,
    topicId: row.topic_id,
    isEventSubmission: row.is_event_submission,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
};

export class KyselySubmissionRepository extends SubmissionRepository {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async findById(id: number): Promise<Submission | null> {
    const row = await this.db
      .selectFrom('workflow.submissions')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    if (!row) return null;
    return toSubmission(row, await this.loadAuthors(id));
  }

  async insert(submission: NewSubmission): Promise<Submission> {
    const row = await this.db
      .insertInto('workflow.submissions')
      .values({ ...toColumns(submission), version: 1 })
      .returningAll()
      .executeTakeFirstOrThrow();
    await this.replaceAuthors(row.id, submission.authors);
    return toSubmission(row, submission.authors);
  }

  async update(
    submission: Submission,
    expectedVersion: number
  ): Promise<Submission> {
    const row = await this.db
      .updateTable('workflow.submissions')
      .set({
        ...toColumns(submission),
        version: expectedVersion + 1,
        updated_at: new Date(),
      })
      .where('id', '=', submission.id)
      .where('version', '=', expectedVersion)
      .returningAll()
      .executeTakeFirst();

    if (!row) {
      throw new ConcurrencyConflictError(
        `Submission ${submission.id} changed since version ${expectedVersion}`
      );
    }
    await this.replaceAuthors(row.id, submission.authors);
    return toSubmission(row, submission.authors);
  }

  private async loadAuthors(submissionId: number): Promise<SubmissionAuthor[]> {
    const rows = await this.db
      .selectFrom('workflow.submission_authors as sa')
      .innerJoin('workflow.users as u', 'u.id', 'sa.user_id')
      .select(['sa.user_id', 'u.user_name', 'sa.ordinal'])
      .where('sa.submission_id', '=', submissionId)
      .orderBy('sa.ordinal', 'asc')
      .execute();
    return rows.map((row) => ({
      userId: row.user_id,
      userName: row.user_name,
      ordinal: row.ordinal,
    }));
  }

  private async replaceAuthors(
    submissionId: number,
    authors: readonly SubmissionAuthor[]
  ): Promise<void> {
    await this.db
      .deleteFrom('workflow.submission_authors')
      .where('submission_id', '=', submissionId)
      .execute();
    if (authors.length === 0) return;
    await this.db
      .insertInto('workflow.submission_authors')
      .values(
        authors.map((author) => ({
          submission_id: submissionId,
          user_id: author.userId,
          ordinal: author.ordinal,
        }))
      )
      .execute();
  }
}
