import { type Context, Hono } from 'hono';
import type { FetchFunction } from '../src/types/request.js';
import { type BonusRecord, makeBonus, makeUser, type UserRecord } from './fixtures.js';

export const E2E_TOKEN = 'test-secret';
export const E2E_BASE_URL = 'http://api.e2e.test/api/v1';

interface WebhookRecord {
  id: string;
  url: string;
  event_types: string[];
}

export interface E2EServer {
  /** Hands requests to the app without opening a socket. */
  fetch: FetchFunction;
  /** `METHOD /path?query` of every request received, in order. */
  requests: string[];
  users: UserRecord[];
  bonuses: BonusRecord[];
  webhooks: Map<string, WebhookRecord>;
}

function ok(c: Context, result: unknown) {
  return c.json({ success: true, result });
}

function fail(c: Context, message: string, status: 200 | 400 | 401 = 200) {
  return c.json({ success: false, message }, status);
}

function page<T>(c: Context, items: T[]): T[] {
  const skip = Number(c.req.query('skip') ?? 0);
  const limit = Number(c.req.query('limit') ?? 20);
  return items.slice(skip, skip + limit);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | null {
  return Array.isArray(value) && value.every((item): item is string => typeof item === 'string') ? value : null;
}

/**
 * In-process stand-in for the Bonusly API, seeded with `userCount` users and one bonus
 * per ordered pair of neighbouring users.
 */
export function createE2EServer({ userCount = 25 }: { userCount?: number } = {}): E2EServer {
  const users = Array.from({ length: userCount }, (_, index) => makeUser(index));
  const bonuses = users.slice(1).map((receiver, index) => makeBonus(index, users[index] ?? receiver, receiver));
  const webhooks = new Map<string, WebhookRecord>();
  const requests: string[] = [];
  let nextWebhook = 1;

  const app = new Hono().basePath('/api/v1');

  app.use('*', async (c, next): Promise<Response | void> => {
    const url = new URL(c.req.url);
    requests.push(`${c.req.method} ${url.pathname.replace('/api/v1', '')}${url.search}`);
    if (c.req.header('authorization') !== `Bearer ${E2E_TOKEN}`) {
      return fail(c, 'unauthorized', 401);
    }

    await next();
  });

  app.get('/users', (c) => ok(c, page(c, users)));

  app.get('/users/:id', (c) => {
    const user = users.find(({ id }) => id === c.req.param('id'));
    return user ? ok(c, user) : fail(c, 'not found');
  });

  app.get('/users/:id/bonuses', (c) => {
    const id = c.req.param('id');
    const own = bonuses.filter(({ giver, receivers }) => giver.id === id || receivers.some((r) => r.id === id));
    return ok(c, page(c, own));
  });

  app.get('/bonuses', (c) => {
    const hashtag = c.req.query('hashtag');
    return ok(c, page(c, hashtag ? bonuses.filter((bonus) => bonus.hashtag === hashtag) : bonuses));
  });

  app.get('/bonuses/:id', (c) => {
    const bonus = bonuses.find(({ id }) => id === c.req.param('id'));
    return bonus ? ok(c, bonus) : fail(c, 'not found');
  });

  app.post('/bonuses', async (c) => {
    const body: unknown = await c.req.json();
    if (!isRecord(body) || typeof body.reason !== 'string') {
      return fail(c, 'reason is required', 400);
    }

    const mention = /@(\w+)/.exec(body.reason)?.[1];
    const receiver = users.find(({ email, username }) => email === body.receiver_email || username === mention);
    const giver = users.find(({ email }) => email === body.giver_email) ?? users[1];
    if (!receiver || !giver) {
      return fail(c, 'receiver not found');
    }

    const amount = typeof body.amount === 'number' ? body.amount : Number(/\+(\d+)/.exec(body.reason)?.[1] ?? 1);
    const bonus = { ...makeBonus(bonuses.length, giver, receiver, amount), reason: body.reason };
    bonuses.unshift(bonus);
    return ok(c, bonus);
  });

  app.get('/webhooks', (c) => ok(c, [...webhooks.values()]));

  app.post('/webhooks', async (c) => {
    const body: unknown = await c.req.json();
    const eventTypes = isRecord(body) ? stringList(body.event_types) : null;
    if (!isRecord(body) || typeof body.url !== 'string' || !eventTypes) {
      return fail(c, 'url and event_types are required', 400);
    }

    const webhook = { id: `w${nextWebhook++}`, url: body.url, event_types: eventTypes };
    webhooks.set(webhook.id, webhook);
    return ok(c, webhook);
  });

  app.put('/webhooks/:id', async (c) => {
    const current = webhooks.get(c.req.param('id'));
    if (!current) {
      return fail(c, 'not found');
    }

    const body: unknown = await c.req.json();
    if (!isRecord(body)) {
      return fail(c, 'invalid body', 400);
    }

    const updated = {
      ...current,
      ...(typeof body.url === 'string' && { url: body.url }),
      event_types: stringList(body.event_types) ?? current.event_types,
    };
    webhooks.set(updated.id, updated);
    return ok(c, updated);
  });

  app.delete('/webhooks/:id', (c) => {
    const current = webhooks.get(c.req.param('id'));
    if (!current) {
      return fail(c, 'not found');
    }

    webhooks.delete(current.id);
    return ok(c, current);
  });

  app.get('/companies/show', (c) => ok(c, { id: 'c1', name: 'Example Company', custom_fields: ['team'] }));

  return {
    fetch: async (input, init) => app.request(input, init),
    requests,
    users,
    bonuses,
    webhooks,
  };
}
