import { Injectable } from '@nestjs/common';
import { Kysely } from 'kysely';
import { KyselyForumTopics } from '@collaborators/infrastructure/kysely-forum-topics';
import { KyselyTopicWatcher } from '@collaborators/infrastructure/kysely-topic-watcher';
import { KyselyWikiPages } from '@collaborators/infrastructure/kysely-wiki-pages';
import { KyselyMovieFileRepository } from '@movies/infrastructure/kysely-movie-file.repository';
import { KyselySystemCatalog } from '@movies/infrastructure/kysely-system-catalog';
import { KyselyOutboxRepository } from '@outbox/infrastructure/kysely-outbox.repository';
import { KyselyPublicationRepository } from '@publications/infrastructure/kysely-publication.repository';
import { KyselyGameCatalog } from '@submissions/infrastructure/kysely-game-catalog';
import { KyselyStatusHistoryRepository } from '@submissions/infrastructure/kysely-status-history.repository';
import { KyselySubmissionRepository } from '@submissions/infrastructure/kysely-submission.repository';
import { KyselyUserRepository } from '@submissions/infrastructure/kysely-user.repository';
import {
  WorkflowScope,
  WorkflowUnitOfWork,
} from '../../application/workflow-unit-of-work';
import { DatabaseService } from './database.service';
import { WorkflowDatabase } from './database.types';
import { translatePersistenceError } from './persistence-errors';

export const createWorkflowScope = (
  db: Kysely<WorkflowDatabase>
): WorkflowScope => ({
  submissions: new KyselySubmissionRepository(db),
  statusHistory: new KyselyStatusHistoryRepository(db),
  users: new KyselyUserRepository(db),
  games: new KyselyGameCatalog(db),
  systems: new KyselySystemCatalog(db),
  movieFiles: new KyselyMovieFileRepository(db),
  publications: new KyselyPublicationRepository(db),
  wiki: new KyselyWikiPages(db),
  forum: new KyselyForumTopics(db),
  topicWatcher: new KyselyTopicWatcher(db),
  outbox: new KyselyOutboxRepository(db),
});

@Injectable()
export class KyselyWorkflowUnitOfWork extends WorkflowUnitOfWork {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  current(): WorkflowScope {
    return createWorkflowScope(this.database.getDb());
  }

  async transaction<T>(
    work: (scope: WorkflowScope) => Promise<T>
  ): Promise<T> {
    try {
      return await this.database
        .getDb()
        .transaction()
        .execute((trx) => work(createWorkflowScope(trx)));
    } catch (error) {
      throw translatePersistenceError(error);
    }
  }
}
