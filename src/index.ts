import "dotenv/config";

export { triggerSourceDataProcessing, triggerSharedDataProcessing } from "./triggers.js";
export { publishBatch, observePublish } from "./publisher.js";
export type { PublishBatchParams, PublishOptions, PublishOutcome, PublishSummary } from "./publisher.js";
export {
  extractProjectName,
  extractEnvironment,
  buildBucketId,
  buildSharedBucketId,
  normalizeSourceName,
  sourceTopicId,
  sharedTopicId,
} from "./naming.js";
export type { Environment } from "./naming.js";
export { encodeNotification, buildAttributes, decodeNotification } from "./message.js";
export * from "./schemas.js";
export * from "./errors.js";
export { loadConfig, checkTimeoutMs, MAX_TIMEOUT_MS } from "./config.js";
export type { ServiceConfig } from "./config.js";
export { baseLogger, batchLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { GcsObjectStore, listObjects, classifyStorageError } from "./gcp/storage.js";
export type { ObjectStore, StorageObjectRef } from "./gcp/storage.js";
export { PubSubMessageBus } from "./gcp/pubsub.js";
export type { MessageBus } from "./gcp/pubsub.js";
