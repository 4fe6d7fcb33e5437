import { Kysely } from 'kysely';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import {
  ForumTopics,
  NewSubmissionTopic,
} from '../application/ports/forum-topics';

export class KyselyForumTopics extends ForumTopics {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async createSubmissionTopic(topic: NewSubmissionTopic): Promise<number> {
    const { id } = await this.db
      .insertInto('workflow.forum_topics')
      .values({
        forum_id: topic.forumId,
        title: topic.title,
        submission_id: topic.submissionId,
      })
      .returning('id')
      .executeTakeFirstOrThrow();

    await this.db
      .insertInto('workflow.forum_posts')
      .values({ topic_id: id, poster_id: topic.posterId, text: topic.text })
      .execute();

    return id;
  }

  async findForumId(topicId: number): Promise<number | null> {
    const topic = await this.db
      .selectFrom('workflow.forum_topics')
      .select('forum_id')
      .where('id', '=', topicId)
      .executeTakeFirst();
    return topic?.forum_id ?? null;
  }

  async moveTopic(topicId: number, forumId: number): Promise<void> {
    await this.db
      .updateTable('workflow.forum_topics')
      .set({ forum_id: forumId })
      .where('id', '=', topicId)
      .execute();
  }

  async retitle(topicId: number, title: string): Promise<void> {
    await this.db
      .updateTable('workflow.forum_topics')
      .set({ title })
      .where('id', '=', topicId)
      .execute();
  }
}
