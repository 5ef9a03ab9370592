import { z } from "zod";

export const NOTIFICATION_KIND = "storage#object";
export const PAYLOAD_FORMAT = "JSON_API_V1";
export const REPUBLISH_EVENT_TYPE = "DAPLA-REPUBLISH";

export const NotificationMessageSchema = z.object({
  kind: z.literal(NOTIFICATION_KIND),
  name: z.string().min(1),
  bucket: z.string().min(1),
});

export const PublishAttributesSchema = z.object({
  payloadFormat: z.literal(PAYLOAD_FORMAT),
  bucketId: z.string().min(1),
  objectId: z.string().min(1),
  eventType: z.literal(REPUBLISH_EVENT_TYPE),
});

export type NotificationMessage = z.infer<typeof NotificationMessageSchema>;
export type PublishAttributes = z.infer<typeof PublishAttributesSchema>;
