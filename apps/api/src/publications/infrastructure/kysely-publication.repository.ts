import { Kysely } from 'kysely';
import type {
  NewPublication,
  Publication,
  PublicationHistoryEntry,
  PublicationHistoryFlag,
} from '@tasflow/domain';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import { PublicationRepository } from '../application/ports/publication-repository';

export class KyselyPublicationRepository extends PublicationRepository {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async findById(id: number): Promise<Publication | null> {
    const row = await this.db
      .selectFrom('workflow.publications')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    if (!row) return null;

    const [authors, flags, tags, urls] = await Promise.all([
      this.db
        .selectFrom('workflow.publication_authors as pa')
        .innerJoin('workflow.users as u', 'u.id', 'pa.user_id')
        .select(['pa.user_id', 'u.user_name', 'pa.ordinal'])
        .where('pa.publication_id', '=', id)
        .orderBy('pa.ordinal', 'asc')
        .execute(),
      this.db
        .selectFrom('workflow.publication_flags')
        .select('flag_id')
        .where('publication_id', '=', id)
        .execute(),
      this.db
        .selectFrom('workflow.publication_tags')
        .select('tag_id')
        .where('publication_id', '=', id)
        .execute(),
      this.db
        .selectFrom('workflow.publication_urls')
        .select(['url', 'type', 'display_name'])
        .where('publication_id', '=', id)
        .orderBy('id', 'asc')
        .execute(),
    ]);

    return {
      id: row.id,
      title: row.title,
      submissionId: row.submission_id,
      publicationClassId: row.publication_class_id,
      systemId: row.system_id,
      systemFrameRateId: row.system_frame_rate_id,
      gameId: row.game_id,
      gameVersionId: row.game_version_id,
      gameGoalId: row.game_goal_id,
      emulatorVersion: row.emulator_version,
      frames: row.frames,
      rerecordCount: row.rerecord_count,
      movieFileName: row.movie_file_name,
      movieFileId: row.movie_file_id,
      additionalAuthors: row.additional_authors,
      obsoletedById: row.obsoleted_by_id,
      authors: authors.map((author) => ({
        userId: author.user_id,
        userName: author.user_name,
        ordinal: author.ordinal,
      })),
      flagIds: flags.map((flag) => flag.flag_id),
      tagIds: tags.map((tag) => tag.tag_id),
      urls: urls.map((url) => ({
        url: url.url,
        type: url.type,
        displayName: url.display_name,
      })),
      createdAt: new Date(row.created_at),
    };
  }

  async movieFileNameExists(movieFileName: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('workflow.publications')
      .select('id')
      .where('movie_file_name', '=', movieFileName)
      .executeTakeFirst();
    return row !== undefined;
  }

  async insert(
    publication: NewPublication,
    provisionalTitle: string
  ): Promise<number> {
    const { id } = await this.db
      .insertInto('workflow.publications')
      .values({
        title: provisionalTitle,
        submission_id: publication.submissionId,
        publication_class_id: publication.publicationClassId,
        system_id: publication.systemId,
        system_frame_rate_id: publication.systemFrameRateId,
        game_id: publication.gameId,
        game_version_id: publication.gameVersionId,
        game_goal_id: publication.gameGoalId,
        emulator_version: publication.emulatorVersion,
        frames: publication.frames,
        rerecord_count: publication.rerecordCount,
        movie_file_name: publication.movieFileName,
        movie_file_id: publication.movieFileId,
        additional_authors: publication.additionalAuthors,
        obsoleted_by_id: publication.obsoletedById,
      })
      .returning('id')
      .executeTakeFirstOrThrow();

    if (publication.authors.length > 0) {
      await this.db
        .insertInto('workflow.publication_authors')
        .values(
          publication.authors.map((author) => ({
            publication_id: id,
            user_id: author.userId,
            ordinal: author.ordinal,
          }))
        )
        .execute();
    }
    if (publication.flagIds.length > 0) {
      await this.db
        .insertInto('workflow.publication_flags')
        .values(
          publication.flagIds.map((flagId) => ({
            publication_id: id,
            flag_id: flagId,
          }))
        )
        .execute();
    }
    if (publication.tagIds.length > 0) {
      await this.db
        .insertInto('workflow.publication_tags')
        .values(
          publication.tagIds.map((tagId) => ({
            publication_id: id,
            tag_id: tagId,
          }))
        )
        .execute();
    }
    if (publication.urls.length > 0) {
      await this.db
        .insertInto('workflow.publication_urls')
        .values(
          publication.urls.map((url) => ({
            publication_id: id,
            url: url.url,
            type: url.type,
            display_name: url.displayName,
          }))
        )
        .execute();
    }
    return id;
  }

  async setTitle(id: number, title: string): Promise<void> {
    await this.db
      .updateTable('workflow.publications')
      .set({ title })
      .where('id', '=', id)
      .execute();
  }

  async setObsoletedBy(id: number, obsoletedById: number): Promise<void> {
    await this.db
      .updateTable('workflow.publications')
      .set({ obsoleted_by_id: obsoletedById })
      .where('id', '=', id)
      .execute();
  }

  async obsoletionLinks(gameId: number): Promise<Map<number, number | null>> {
    const rows = await this.db
      .selectFrom('workflow.publications')
      .select(['id', 'obsoleted_by_id'])
      .where('game_id', '=', gameId)
      .execute();
    return new Map(rows.map((row) => [row.id, row.obsoleted_by_id]));
  }

  async listHistoryForGame(gameId: number): Promise<PublicationHistoryEntry[]> {
    const rows = await this.db
      .selectFrom('workflow.publications as p')
      .innerJoin('workflow.game_goals as g', 'g.id', 'p.game_goal_id')
      .innerJoin(
        'workflow.publication_classes as c',
        'c.id',
        'p.publication_class_id'
      )
      .select([
        'p.id',
        'p.title',
        'p.created_at',
        'p.obsoleted_by_id',
        'g.display_name as goal',
        'c.name as class_name',
        'c.icon_path as class_icon_path',
      ])
      .where('p.game_id', '=', gameId)
      .orderBy('p.id', 'asc')
      .execute();
    if (rows.length === 0) return [];

    const flagRows = await this.db
      .selectFrom('workflow.publication_flags as pf')
      .innerJoin('workflow.flags as f', 'f.id', 'pf.flag_id')
      .select(['pf.publication_id', 'f.name', 'f.icon_path', 'f.link_path'])
      .where(
        'pf.publication_id',
        'in',
        rows.map((row) => row.id)
      )
      .execute();

    const flagsByPublication = new Map<number, PublicationHistoryFlag[]>();
    for (const flag of flagRows) {
      const entry: PublicationHistoryFlag = {
        name: flag.name,
        iconPath: flag.icon_path,
        linkPath: flag.link_path,
      };
      const existing = flagsByPublication.get(flag.publication_id);
      if (existing) existing.push(entry);
      else flagsByPublication.set(flag.publication_id, [entry]);
    }

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      goal: row.goal,
      createdAt: new Date(row.created_at),
      className: row.class_name,
      classIconPath: row.class_icon_path,
      flags: flagsByPublication.get(row.id) ?? [],
      obsoletedById: row.obsoleted_by_id,
    }));
  }
}
