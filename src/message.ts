import {
  NOTIFICATION_KIND,
  NotificationMessageSchema,
  PAYLOAD_FORMAT,
  REPUBLISH_EVENT_TYPE,
  type NotificationMessage,
  type PublishAttributes,
} from "./schemas.js";

export function encodeNotification(bucketId: string, objectName: string): Buffer {
  const message: NotificationMessage = {
    kind: NOTIFICATION_KIND,
    name: `${bucketId}/${objectName}`,
    bucket: bucketId,
  };
  return Buffer.from(JSON.stringify(message), "utf-8");
}

export function buildAttributes(bucketId: string, objectName: string): PublishAttributes {
  return {
    payloadFormat: PAYLOAD_FORMAT,
    bucketId,
    objectId: objectName,
    eventType: REPUBLISH_EVENT_TYPE,
  };
}

/** Parse a payload produced by {@link encodeNotification}; throws a ZodError on anything else. */
export function decodeNotification(data: Buffer | Uint8Array | string): NotificationMessage {
  const text = typeof data === "string" ? data : Buffer.from(data).toString("utf-8");
  return NotificationMessageSchema.parse(JSON.parse(text));
}
