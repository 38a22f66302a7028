import { z } from 'zod';
import type { RequestClient } from '../core/client.js';
import type { CallOptions } from '../core/types.js';
import { type CreateWebhook, type UpdateWebhook, type Webhook, webhookSchema } from '../models/webhook.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const webhookListSchema = z.array(webhookSchema);

/**
 * Webhooks registered for the company. The list is short and comes back whole.
 */
export class WebhooksResource {
  readonly #client: RequestClient;

  constructor(client: RequestClient) {
    this.#client = client;
  }

  list(opts?: CallOptions): SafeWrapAsync<Error, Webhook[]> {
    return this.#client.get('/webhooks', webhookListSchema, undefined, opts);
  }

  create(params: CreateWebhook, opts?: CallOptions): SafeWrapAsync<Error, Webhook> {
    return this.#client.post('/webhooks', params, webhookSchema, opts);
  }

  update(id: string, params: UpdateWebhook, opts?: CallOptions): SafeWrapAsync<Error, Webhook> {
    return this.#client.put(`/webhooks/${encodeURIComponent(id)}`, params, webhookSchema, opts);
  }

  /**
   * Removes a webhook, resolving to the removed webhook.
   */
  remove(id: string, opts?: CallOptions): SafeWrapAsync<Error, Webhook> {
    return this.#client.delete(`/webhooks/${encodeURIComponent(id)}`, webhookSchema, opts);
  }
}
