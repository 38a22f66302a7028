import { z } from 'zod';

/** Events a webhook can subscribe to. */
export const eventTypeSchema = z.enum(['bonus.created', 'achievement.created']);

/** Events a webhook can subscribe to. */
export type EventType = z.infer<typeof eventTypeSchema>;

/** A registered webhook. */
export const webhookSchema = z.object({
  id: z.string(),
  url: z.string().url(),
  event_types: z.array(eventTypeSchema),
});

/** A registered webhook. */
export type Webhook = z.infer<typeof webhookSchema>;

/** Body of `POST /webhooks`. */
export interface CreateWebhook {
  url: string;
  event_types: EventType[];
}

/** Body of `PUT /webhooks/{id}`. */
export type UpdateWebhook = Partial<CreateWebhook>;
