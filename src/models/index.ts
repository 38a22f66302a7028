export { type Bonus, bonusSchema, type CreateBonus } from './bonus.js';
export { type Company, companySchema } from './company.js';
export { timestamp } from './shared.js';
export { type User, type UserMode, userModeSchema, userSchema } from './user.js';
export {
  type CreateWebhook,
  type EventType,
  eventTypeSchema,
  type UpdateWebhook,
  type Webhook,
  webhookSchema,
} from './webhook.js';
