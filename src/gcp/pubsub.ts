import { PubSub, type Topic } from "@google-cloud/pubsub";

export interface MessageBus {
  topicPath(topicId: string): Promise<string>;
  /** Resolves with the server-assigned message id once the publish is acknowledged. */
  publish(topicId: string, data: Buffer, attributes: Record<string, string>): Promise<string>;
  close(): Promise<void>;
}

export class PubSubMessageBus implements MessageBus {
  private readonly pubsub: PubSub;
  private readonly projectId?: string;
  // one Topic per id so a batch shares its publisher queue
  private readonly topics = new Map<string, Topic>();

  constructor(projectId?: string) {
    this.projectId = projectId;
    this.pubsub = new PubSub({ projectId });
  }

  private topic(topicId: string): Topic {
    let topic = this.topics.get(topicId);
    if (!topic) {
      topic = this.pubsub.topic(topicId);
      this.topics.set(topicId, topic);
    }
    return topic;
  }

  async topicPath(topicId: string): Promise<string> {
    const projectId = this.projectId ?? (await this.pubsub.getProjectId());
    return `projects/${projectId}/topics/${topicId}`;
  }

  publish(topicId: string, data: Buffer, attributes: Record<string, string>): Promise<string> {
    return this.topic(topicId).publishMessage({ data, attributes });
  }

  async close(): Promise<void> {
    this.topics.clear();
    await this.pubsub.close();
  }
}
