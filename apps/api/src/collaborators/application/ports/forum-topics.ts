export type NewSubmissionTopic = Readonly<{
  forumId: number;
  submissionId: number;
  title: string;
  posterId: number;
  text: string;
}>;

export abstract class ForumTopics {
  /** Creates the discussion topic with its opening post; returns the topic id. */
  abstract createSubmissionTopic(topic: NewSubmissionTopic): Promise<number>;

  /** The forum the topic currently sits in; null for an unknown topic. */
  abstract findForumId(topicId: number): Promise<number | null>;

  abstract moveTopic(topicId: number, forumId: number): Promise<void>;

  abstract retitle(topicId: number, title: string): Promise<void>;
}
