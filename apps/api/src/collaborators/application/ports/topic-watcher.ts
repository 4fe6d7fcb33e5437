export abstract class TopicWatcher {
  abstract watchTopic(
    topicId: number,
    userId: number,
    enabled: boolean
  ): Promise<void>;
}
