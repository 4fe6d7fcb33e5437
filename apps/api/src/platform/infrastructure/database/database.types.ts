import { ColumnType, Generated } from 'kysely';

type TimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string
>;

// pg returns bigint columns as strings.
type BigIntColumn = ColumnType<string, number | string, number | string>;

export interface UsersTable {
  id: Generated<number>;
  user_name: string;
  created_at: TimestampColumn;
}

export interface RolesTable {
  id: Generated<number>;
  name: string;
  auto_assign_on_publication: boolean;
}

export interface UserRolesTable {
  user_id: number;
  role_id: number;
}

export interface GameSystemsTable {
  id: Generated<number>;
  code: string;
  display_name: string;
}

export interface SystemFrameRatesTable {
  id: Generated<number>;
  system_id: number;
  frame_rate: number;
  region_code: string;
  obsolete: Generated<boolean>;
}

export interface DeprecatedMovieFormatsTable {
  file_extension: string;
  deprecated: boolean;
}

export interface GamesTable {
  id: Generated<number>;
  display_name: string;
}

export interface GameVersionsTable {
  id: Generated<number>;
  game_id: number;
  name: string;
}

export interface GameGoalsTable {
  id: Generated<number>;
  game_id: number;
  display_name: string;
}

export interface PublicationClassesTable {
  id: Generated<number>;
  name: string;
  icon_path: string | null;
}

export interface FlagsTable {
  id: Generated<number>;
  name: string;
  icon_path: string | null;
  link_path: string | null;
}

export interface TagsTable {
  id: Generated<number>;
  code: string;
  display_name: string;
}

export interface MovieFilesTable {
  id: Generated<number>;
  file_name: string;
  content: Buffer;
  compression: 'zip';
  original_length: number;
  created_at: TimestampColumn;
}

export interface SubmissionsTable {
  id: Generated<number>;
  version: number;
  status: string;
  title: string;
  submitter_id: number;
  judge_id: number | null;
  publisher_id: number | null;
  additional_authors: string | null;
  game_name: string;
  submitted_game_version: string | null;
  branch: string | null;
  rom_name: string | null;
  emulator_version: string | null;
  encode_embed_link: string | null;
  game_id: number | null;
  game_version_id: number | null;
  game_goal_id: number | null;
  system_id: number | null;
  system_frame_rate_id: number | null;
  intended_class_id: number | null;
  rejection_reason_id: number | null;
  movie_file_id: number;
  movie_extension: string;
  movie_start_type: string;
  frames: number;
  rerecord_count: number;
  cycle_count: BigIntColumn | null;
  annotations: string | null;
  warnings: string | null;
  hash_type: string | null;
  hash: string | null;
  topic_id: number | null;
  is_event_submission: boolean;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

export interface SubmissionAuthorsTable {
  submission_id: number;
  user_id: number;
  ordinal: number;
}

export interface SubmissionStatusHistoryTable {
  id: Generated<number>;
  submission_id: number;
  status: string;
  created_at: TimestampColumn;
}

export interface PublicationsTable {
  id: Generated<number>;
  title: string;
  submission_id: number;
  publication_class_id: number;
  system_id: number;
  system_frame_rate_id: number;
  game_id: number;
  game_version_id: number;
  game_goal_id: number;
  emulator_version: string | null;
  frames: number;
  rerecord_count: number;
  movie_file_name: string;
  movie_file_id: number;
  additional_authors: string | null;
  obsoleted_by_id: number | null;
  created_at: TimestampColumn;
}

export interface PublicationAuthorsTable {
  publication_id: number;
  user_id: number;
  ordinal: number;
}

export interface PublicationFlagsTable {
  publication_id: number;
  flag_id: number;
}

export interface PublicationTagsTable {
  publication_id: number;
  tag_id: number;
}

export interface PublicationUrlsTable {
  id: Generated<number>;
  publication_id: number;
  url: string;
  type: 'streaming' | 'mirror';
  display_name: string | null;
}

export interface ForumTopicsTable {
  id: Generated<number>;
  forum_id: number;
  title: string;
  submission_id: number | null;
  created_at: TimestampColumn;
}

export interface ForumPostsTable {
  id: Generated<number>;
  topic_id: number;
  poster_id: number | null;
  text: string;
  created_at: TimestampColumn;
}

export interface TopicWatchesTable {
  topic_id: number;
  user_id: number;
}

export interface WikiPagesTable {
  id: Generated<number>;
  page_name: string;
  revision: number;
  markup: string;
  author_id: number;
  revision_message: string | null;
  minor_edit: boolean;
  is_current: boolean;
  created_at: TimestampColumn;
}

export interface OutboxTasksTable {
  id: Generated<number>;
  kind: string;
  payload: ColumnType<unknown, string, string>;
  state: 'pending' | 'running' | 'done' | 'failed';
  attempts: Generated<number>;
  last_error: string | null;
  created_at: TimestampColumn;
  updated_at: TimestampColumn;
}

export interface WorkflowDatabase {
  'workflow.users': UsersTable;
  'workflow.roles': RolesTable;
  'workflow.user_roles': UserRolesTable;
  'workflow.game_systems': GameSystemsTable;
  'workflow.system_frame_rates': SystemFrameRatesTable;
  'workflow.deprecated_movie_formats': DeprecatedMovieFormatsTable;
  'workflow.games': GamesTable;
  'workflow.game_versions': GameVersionsTable;
  'workflow.game_goals': GameGoalsTable;
  'workflow.publication_classes': PublicationClassesTable;
  'workflow.flags': FlagsTable;
  'workflow.tags': TagsTable;
  'workflow.movie_files': MovieFilesTable;
  'workflow.submissions': SubmissionsTable;
  'workflow.submission_authors': SubmissionAuthorsTable;
  'workflow.submission_status_history': SubmissionStatusHistoryTable;
  'workflow.publications': PublicationsTable;
  'workflow.publication_authors': PublicationAuthorsTable;
  'workflow.publication_flags': PublicationFlagsTable;
  'workflow.publication_tags': PublicationTagsTable;
  'workflow.publication_urls': PublicationUrlsTable;
  'workflow.forum_topics': ForumTopicsTable;
  'workflow.forum_posts': ForumPostsTable;
  'workflow.topic_watches': TopicWatchesTable;
  'workflow.wiki_pages': WikiPagesTable;
  'workflow.outbox_tasks': OutboxTasksTable;
}
