import pino from "pino";

export type Logger = pino.Logger;

export const baseLogger: Logger = pino({ level: process.env.LOG_LEVEL || "info", name: "pubsub-republish" });

export type BatchFields = {
  bucketId: string;
  prefix: string;
  topicId: string;
};

export function batchLogger(fields: BatchFields, parent: Logger = baseLogger): Logger {
  return parent.child(fields);
}
