import { Kysely, sql } from 'kysely';

// Migrations are frozen in time and typed against an unknown schema.
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema.createSchema('workflow').ifNotExists().execute();

  await db.schema
    .createTable('workflow.users')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('user_name', 'varchar', (col) => col.notNull().unique())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('workflow.roles')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar', (col) => col.notNull().unique())
    .addColumn('auto_assign_on_publication', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .execute();

  await db.schema
    .createTable('workflow.user_roles')
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('workflow.users.id')
    )
    .addColumn('role_id', 'integer', (col) =>
      col.notNull().references('workflow.roles.id')
    )
    .addPrimaryKeyConstraint('user_roles_pk', ['user_id', 'role_id'])
    .execute();

  await db.schema
    .createTable('workflow.game_systems')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('code', 'varchar', (col) => col.notNull().unique())
    .addColumn('display_name', 'varchar', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('workflow.system_frame_rates')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('system_id', 'integer', (col) =>
      col.notNull().references('workflow.game_systems.id')
    )
    .addColumn('frame_rate', 'double precision', (col) => col.notNull())
    .addColumn('region_code', 'varchar', (col) => col.notNull())
    .addColumn('obsolete', 'boolean', (col) => col.notNull().defaultTo(false))
    .addUniqueConstraint('system_frame_rates_triple_unique', [
      'system_id',
      'frame_rate',
      'region_code',
    ])
    .execute();

  await db.schema
    .createTable('workflow.deprecated_movie_formats')
    .addColumn('file_extension', 'varchar', (col) => col.primaryKey())
    .addColumn('deprecated', 'boolean', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('workflow.games')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('display_name', 'varchar', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('workflow.game_versions')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('game_id', 'integer', (col) =>
      col.notNull().references('workflow.games.id')
    )
    .addColumn('name', 'varchar', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('workflow.game_goals')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('game_id', 'integer', (col) =>
      col.notNull().references('workflow.games.id')
    )
    .addColumn('display_name', 'varchar', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('workflow.publication_classes')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar', (col) => col.notNull())
    .addColumn('icon_path', 'varchar')
    .execute();

  await db.schema
    .createTable('workflow.flags')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar', (col) => col.notNull())
    .addColumn('icon_path', 'varchar')
    .addColumn('link_path', 'varchar')
    .execute();

  await db.schema
    .createTable('workflow.tags')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('code', 'varchar', (col) => col.notNull().unique())
    .addColumn('display_name', 'varchar', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('workflow.movie_files')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('file_name', 'varchar', (col) => col.notNull())
    .addColumn('content', 'bytea', (col) => col.notNull())
    .addColumn('compression', 'varchar', (col) => col.notNull())
    .addColumn('original_length', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('workflow.forum_topics')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('forum_id', 'integer', (col) => col.notNull())
    .addColumn('title', 'varchar', (col) => col.notNull())
    .addColumn('submission_id', 'integer')
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('workflow.forum_posts')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('topic_id', 'integer', (col) =>
      col.notNull().references('workflow.forum_topics.id')
    )
    .addColumn('poster_id', 'integer', (col) =>
      col.references('workflow.users.id')
    )
    .addColumn('text', 'text', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('workflow.topic_watches')
    .addColumn('topic_id', 'integer', (col) =>
      col.notNull().references('workflow.forum_topics.id')
    )
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('workflow.users.id')
    )
    .addPrimaryKeyConstraint('topic_watches_pk', ['topic_id', 'user_id'])
    .execute();

  await db.schema
    .createTable('workflow.submissions')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('version', 'integer', (col) => col.notNull().defaultTo(1))
    .addColumn('status', 'varchar', (col) => col.notNull())
    .addColumn('title', 'varchar', (col) => col.notNull())
    .addColumn('submitter_id', 'integer', (col) =>
      col.notNull().references('workflow.users.id')
    )
    .addColumn('judge_id', 'integer', (col) =>
      col.references('workflow.users.id')
    )
    .addColumn('publisher_id', 'integer', (col) =>
      col.references('workflow.users.id')
    )
    .addColumn('additional_authors', 'varchar')
    .addColumn('game_name', 'varchar', (col) => col.notNull())
    .addColumn('submitted_game_version', 'varchar')
    .addColumn('branch', 'varchar')
    .addColumn('rom_name', 'varchar')
    .addColumn('emulator_version', 'varchar')
    .addColumn('encode_embed_link', 'varchar')
    .addColumn('game_id', 'integer', (col) =>
      col.references('workflow.games.id')
    )
    .addColumn('game_version_id', 'integer', (col) =>
      col.references('workflow.game_versions.id')
    )
    .addColumn('game_goal_id', 'integer', (col) =>
      col.references('workflow.game_goals.id')
    )
    .addColumn('system_id', 'integer', (col) =>
      col.references('workflow.game_systems.id')
    )
    .addColumn('system_frame_rate_id', 'integer', (col) =>
      col.references('workflow.system_frame_rates.id')
    )
    .addColumn('intended_class_id', 'integer', (col) =>
      col.references('workflow.publication_classes.id')
    )
    .addColumn('rejection_reason_id', 'integer')
    .addColumn('movie_file_id', 'integer', (col) =>
      col.notNull().references('workflow.movie_files.id')
    )
    .addColumn('movie_extension', 'varchar', (col) => col.notNull())
    .addColumn('movie_start_type', 'varchar', (col) => col.notNull())
    .addColumn('frames', 'integer', (col) => col.notNull())
    .addColumn('rerecord_count', 'integer', (col) => col.notNull())
    .addColumn('cycle_count', 'bigint')
    .addColumn('annotations', 'varchar(3500)')
    .addColumn('warnings', 'varchar(500)')
    .addColumn('hash_type', 'varchar')
    .addColumn('hash', 'varchar')
    .addColumn('topic_id', 'integer', (col) =>
      col.references('workflow.forum_topics.id')
    )
    .addColumn('is_event_submission', 'boolean', (col) =>
      col.notNull().defaultTo(false)
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('workflow.submission_authors')
    .addColumn('submission_id', 'integer', (col) =>
      col.notNull().references('workflow.submissions.id')
    )
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('workflow.users.id')
    )
    .addColumn('ordinal', 'integer', (col) => col.notNull())
    .addPrimaryKeyConstraint('submission_authors_pk', [
      'submission_id',
      'user_id',
    ])
    .execute();

  await db.schema
    .createTable('workflow.submission_status_history')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('submission_id', 'integer', (col) =>
      col.notNull().references('workflow.submissions.id')
    )
    .addColumn('status', 'varchar', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createTable('workflow.publications')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('title', 'varchar', (col) => col.notNull())
    .addColumn('submission_id', 'integer', (col) =>
      col.notNull().references('workflow.submissions.id')
    )
    .addColumn('publication_class_id', 'integer', (col) =>
      col.notNull().references('workflow.publication_classes.id')
    )
    .addColumn('system_id', 'integer', (col) =>
      col.notNull().references('workflow.game_systems.id')
    )
    .addColumn('system_frame_rate_id', 'integer', (col) =>
      col.notNull().references('workflow.system_frame_rates.id')
    )
    .addColumn('game_id', 'integer', (col) =>
      col.notNull().references('workflow.games.id')
    )
    .addColumn('game_version_id', 'integer', (col) =>
      col.notNull().references('workflow.game_versions.id')
    )
    .addColumn('game_goal_id', 'integer', (col) =>
      col.notNull().references('workflow.game_goals.id')
    )
    .addColumn('emulator_version', 'varchar')
    .addColumn('frames', 'integer', (col) => col.notNull())
    .addColumn('rerecord_count', 'integer', (col) => col.notNull())
    .addColumn('movie_file_name', 'varchar', (col) => col.notNull().unique())
    .addColumn('movie_file_id', 'integer', (col) =>
      col.notNull().references('workflow.movie_files.id')
    )
    .addColumn('additional_authors', 'varchar')
    .addColumn('obsoleted_by_id', 'integer', (col) =>
      col.references('workflow.publications.id')
    )
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addCheckConstraint(
      'publications_not_self_obsoleted',
      sql`obsoleted_by_id is null or obsoleted_by_id <> id`
    )
    .execute();

  await db.schema
    .createIndex('publications_game_idx')
    .on('workflow.publications')
    .column('game_id')
    .execute();

  await db.schema
    .createTable('workflow.publication_authors')
    .addColumn('publication_id', 'integer', (col) =>
      col.notNull().references('workflow.publications.id')
    )
    .addColumn('user_id', 'integer', (col) =>
      col.notNull().references('workflow.users.id')
    )
    .addColumn('ordinal', 'integer', (col) => col.notNull())
    .addPrimaryKeyConstraint('publication_authors_pk', [
      'publication_id',
      'user_id',
    ])
    .execute();

  await db.schema
    .createTable('workflow.publication_flags')
    .addColumn('publication_id', 'integer', (col) =>
      col.notNull().references('workflow.publications.id')
    )
    .addColumn('flag_id', 'integer', (col) =>
      col.notNull().references('workflow.flags.id')
    )
    .addPrimaryKeyConstraint('publication_flags_pk', [
      'publication_id',
      'flag_id',
    ])
    .execute();

  await db.schema
    .createTable('workflow.publication_tags')
    .addColumn('publication_id', 'integer', (col) =>
      col.notNull().references('workflow.publications.id')
    )
    .addColumn('tag_id', 'integer', (col) =>
      col.notNull().references('workflow.tags.id')
    )
    .addPrimaryKeyConstraint('publication_tags_pk', [
      'publication_id',
      'tag_id',
    ])
    .execute();

  await db.schema
    .createTable('workflow.publication_urls')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('publication_id', 'integer', (col) =>
      col.notNull().references('workflow.publications.id')
    )
    .addColumn('url', 'varchar', (col) => col.notNull())
    .addColumn('type', 'varchar', (col) => col.notNull())
    .addColumn('display_name', 'varchar')
    .execute();

  await db.schema
    .createTable('workflow.wiki_pages')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('page_name', 'varchar', (col) => col.notNull())
    .addColumn('revision', 'integer', (col) => col.notNull())
    .addColumn('markup', 'text', (col) => col.notNull())
    .addColumn('author_id', 'integer', (col) =>
      col.notNull().references('workflow.users.id')
    )
    .addColumn('revision_message', 'varchar')
    .addColumn('minor_edit', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('is_current', 'boolean', (col) => col.notNull())
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addUniqueConstraint('wiki_pages_revision_unique', [
      'page_name',
      'revision',
    ])
    .execute();

  await db.schema
    .createTable('workflow.outbox_tasks')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('kind', 'varchar', (col) => col.notNull())
    .addColumn('payload', 'jsonb', (col) => col.notNull())
    .addColumn('state', 'varchar', (col) => col.notNull())
    .addColumn('attempts', 'integer', (col) => col.notNull().defaultTo(0))
    .addColumn('last_error', 'text')
    .addColumn('created_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .addColumn('updated_at', 'timestamptz', (col) =>
      col.notNull().defaultTo(sql`now()`)
    )
    .execute();

  await db.schema
    .createIndex('outbox_tasks_pending_idx')
    .on('workflow.outbox_tasks')
    .columns(['state', 'id'])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  const tables = [
    'workflow.outbox_tasks',
    'workflow.wiki_pages',
    'workflow.publication_urls',
    'workflow.publication_tags',
    'workflow.publication_flags',
    'workflow.publication_authors',
    'workflow.publications',
    'workflow.submission_status_history',
    'workflow.submission_authors',
    'workflow.submissions',
    'workflow.topic_watches',
    'workflow.forum_posts',
    'workflow.forum_topics',
    'workflow.movie_files',
    'workflow.tags',
    'workflow.flags',
    'workflow.publication_classes',
    'workflow.game_goals',
    'workflow.game_versions',
    'workflow.games',
    'workflow.deprecated_movie_formats',
    'workflow.system_frame_rates',
    'workflow.game_systems',
    'workflow.user_roles',
    'workflow.roles',
    'workflow.users',
  ];
  for (const table of tables) {
    await db.schema.dropTable(table).ifExists().execute();
  }
  await db.schema.dropSchema('workflow').ifExists().execute();
}
