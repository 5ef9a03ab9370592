import { checkTimeoutMs, loadConfig } from "./config.js";
import { EmptyBatchError, PublishTimeoutError, errorMessage } from "./errors.js";
import { GcsObjectStore, type ObjectStore } from "./gcp/storage.js";
import { PubSubMessageBus, type MessageBus } from "./gcp/pubsub.js";
import { batchLogger, type Logger } from "./logger.js";
import { buildAttributes, encodeNotification } from "./message.js";

export type PublishBatchParams = {
  /** Project owning the bucket and the topic; falls back to GCP_PROJECT_ID. */
  projectId?: string;
  bucketId: string;
  prefix: string;
  topicId: string;
};

export type PublishOptions = {
  store?: ObjectStore;
  bus?: MessageBus;
  logger?: Logger;
  /** Per-message wait before the publish is reported as timed out. */
  timeoutMs?: number;
};

export type PublishOutcome =
  | { objectName: string; status: "published"; messageId: string }
  | { objectName: string; status: "timeout"; error: PublishTimeoutError }
  | { objectName: string; status: "failed"; error: string };

export type PublishSummary = {
  topicPath: string;
  total: number;
  published: number;
  timedOut: number;
  failed: number;
  outcomes: PublishOutcome[];
};

function submit(bus: MessageBus, topicId: string, bucketId: string, objectName: string): Promise<string> {
  try {
    return bus.publish(topicId, encodeNotification(bucketId, objectName), buildAttributes(bucketId, objectName));
  } catch (e) {
    return Promise.reject(e);
  }
}

/**
 * Wait on one publish handle. The returned promise never rejects: a timeout or a
 * failed publish becomes an outcome and a log line. Whatever the handle does
 * after the timeout fired is ignored.
 */
export function observePublish(handle: Promise<string>, objectName: string, timeoutMs: number, log: Logger): Promise<PublishOutcome> {
  checkTimeoutMs(timeoutMs);
  return new Promise((resolve) => {
    let settled = false;
    const timer = setTimeout(() => {
      settled = true;
      const error = new PublishTimeoutError(objectName, timeoutMs);
      log.warn({ objectName, timeoutMs }, error.message);
      resolve({ objectName, status: "timeout", error });
    }, timeoutMs);

    handle.then(
      (messageId) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ objectName, status: "published", messageId });
      },
      (err: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        log.error({ objectName, err }, `Publishing message for ${objectName} failed`);
        resolve({ objectName, status: "failed", error: errorMessage(err) });
      }
    );
  });
}

/**
 * Publish one storage notification per object under `prefix` to `topicId`.
 *
 * Every publish is issued before any is awaited. Only an empty listing (or a
 * failed one) rejects; individual timeouts and publish failures are logged and
 * counted in the summary.
 *
 * A bus passed in `options` is left open; one created here is closed once
 * every outcome is in.
 */
export async function publishBatch(params: PublishBatchParams, options: PublishOptions = {}): Promise<PublishSummary> {
  const { bucketId, prefix, topicId } = params;
  const config = options.timeoutMs === undefined || params.projectId === undefined ? loadConfig() : undefined;
  const projectId = params.projectId ?? config?.projectId;
  const timeoutMs = checkTimeoutMs(options.timeoutMs ?? config?.publish.timeoutMs ?? 60_000);
  const log = batchLogger({ bucketId, prefix, topicId }, options.logger);
  const store = options.store ?? new GcsObjectStore(projectId);

  const objects = await store.list(bucketId, prefix);
  if (objects.length === 0) {
    throw new EmptyBatchError(bucketId, prefix);
  }

  const ownsBus = options.bus === undefined;
  const bus = options.bus ?? new PubSubMessageBus(projectId);
  try {
    const topicPath = await bus.topicPath(topicId);
    log.debug({ count: objects.length, topicPath }, "publishing batch");

    const pending = objects.map((obj) => observePublish(submit(bus, topicId, bucketId, obj.name), obj.name, timeoutMs, log));
    const outcomes = await Promise.all(pending);

    const summary: PublishSummary = {
      topicPath,
      total: outcomes.length,
      published: outcomes.filter((o) => o.status === "published").length,
      timedOut: outcomes.filter((o) => o.status === "timeout").length,
      failed: outcomes.filter((o) => o.status === "failed").length,
      outcomes,
    };
    log.info({ published: summary.published, timedOut: summary.timedOut, failed: summary.failed }, `Messages published to ${topicPath}`);
    return summary;
  } finally {
    if (ownsBus) await bus.close();
  }
}
