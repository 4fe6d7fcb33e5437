import type { ForumTopics } from '@collaborators/application/ports/forum-topics';
import type { TopicWatcher } from '@collaborators/application/ports/topic-watcher';
import type { WikiPages } from '@collaborators/application/ports/wiki-pages';
import type { MovieFileRepository } from '@movies/application/ports/movie-file-repository';
import type { SystemCatalog } from '@movies/application/ports/system-catalog';
import type { OutboxRepository } from '@outbox/application/ports/outbox-repository';
import type { PublicationRepository } from '@publications/application/ports/publication-repository';
import type { GameCatalog } from '@submissions/application/ports/game-catalog';
import type { StatusHistoryRepository } from '@submissions/application/ports/status-history-repository';
import type { SubmissionRepository } from '@submissions/application/ports/submission-repository';
import type { UserRepository } from '@submissions/application/ports/user-repository';

/**
 * Everything a workflow operation reads or writes, bound either to the
 * connection pool or to one transaction.
 */
export type WorkflowScope = Readonly<{
  submissions: SubmissionRepository;
  statusHistory: StatusHistoryRepository;
  users: UserRepository;
  games: GameCatalog;
  systems: SystemCatalog;
  movieFiles: MovieFileRepository;
  publications: PublicationRepository;
  wiki: WikiPages;
  forum: ForumTopics;
  topicWatcher: TopicWatcher;
  outbox: OutboxRepository;
}>;

export abstract class WorkflowUnitOfWork {
  /** Repositories outside any transaction. */
  abstract current(): WorkflowScope;

  /**
   * Runs `work` in one transaction; it commits when `work` resolves and rolls
   * back when it throws.
   */
  abstract transaction<T>(work: (scope: WorkflowScope) => Promise<T>): Promise<T>;
}
