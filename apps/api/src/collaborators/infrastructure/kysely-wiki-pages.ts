import { Kysely, Selectable } from 'kysely';
import type { WorkflowDatabase, WikiPagesTable } from '@platform/infrastructure/database/database.types';
import {
  NewWikiRevision,
  WikiPage,
  WikiPages,
} from '../application/ports/wiki-pages';

const toWikiPage = (row: Selectable<WikiPagesTable>): WikiPage => ({
  pageName: row.page_name,
  revision: row.revision,
  markup: row.markup,
  authorId: row.author_id,
  revisionMessage: row.revision_message,
  minorEdit: row.minor_edit,
  createdAt: new Date(row.created_at),
});

export class KyselyWikiPages extends WikiPages {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async add(revision: NewWikiRevision): Promise<WikiPage> {
    const latest = await this.db
      .selectFrom('workflow.wiki_pages')
      .select(({ fn }) => fn.max<number | null>('revision').as('revision'))
      .where('page_name', '=', revision.pageName)
      .executeTakeFirst();
    const nextRevision = Number(latest?.revision ?? 0) + 1;

    await this.db
      .updateTable('workflow.wiki_pages')
      .set({ is_current: false })
      .where('page_name', '=', revision.pageName)
      .where('is_current', '=', true)
      .execute();

    const row = await this.db
      .insertInto('workflow.wiki_pages')
      .values({
        page_name: revision.pageName,
        revision: nextRevision,
        markup: revision.markup,
        author_id: revision.authorId,
        revision_message: revision.revisionMessage,
        minor_edit: revision.minorEdit ?? false,
        is_current: true,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toWikiPage(row);
  }

  async page(pageName: string): Promise<WikiPage | null> {
    const row = await this.db
      .selectFrom('workflow.wiki_pages')
      .selectAll()
      .where('page_name', '=', pageName)
      .where('is_current', '=', true)
      .executeTakeFirst();
    return row ? toWikiPage(row) : null;
  }
}
