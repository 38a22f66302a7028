export { BonusesResource } from './bonuses.js';
export { CompanyResource } from './company.js';
export { UsersResource } from './users.js';
export { WebhooksResource } from './webhooks.js';
