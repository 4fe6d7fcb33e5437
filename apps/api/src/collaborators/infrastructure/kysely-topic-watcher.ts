import { Kysely } from 'kysely';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import { TopicWatcher } from '../application/ports/topic-watcher';

export class KyselyTopicWatcher extends TopicWatcher {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async watchTopic(
    topicId: number,
    userId: number,
    enabled: boolean
  ): Promise<void> {
    if (!enabled) {
      await this.db
        .deleteFrom('workflow.topic_watches')
        .where('topic_id', '=', topicId)
        .where('user_id', '=', userId)
        .execute();
      return;
    }
    await this.db
      .insertInto('workflow.topic_watches')
      .values({ topic_id: topicId, user_id: userId })
      .onConflict((oc) => oc.columns(['topic_id', 'user_id']).doNothing())
      .execute();
  }
}
