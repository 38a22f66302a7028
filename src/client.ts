import { type ClientConfig, type LoadConfigOptions, loadConfig } from './config/config.js';
import { RequestClient, type RequestClientProps } from './core/client.js';
import { BonusesResource, CompanyResource, UsersResource, WebhooksResource } from './resources/index.js';
import { type SafeWrap, safeWrap } from './utils/wrap.js';

/** Options of {@link BonuslyClient.fromEnv}: where to load settings from, plus non-setting client options. */
export type FromEnvOptions = LoadConfigOptions & Omit<RequestClientProps, keyof ClientConfig>;

/**
 * Bonusly API client.
 *
 * @example
 * ```typescript
 * const [err, client] = BonuslyClient.fromEnv();
 * if (err) {
 *   throw err;
 * }
 *
 * const [errUser, user] = await client.users.get('5b0d0e3a3b2f1e0001a2b3c4');
 *
 * for await (const bonus of client.bonuses.forUser(user.id, 50)) {
 *   console.log(bonus.reason_decoded);
 * }
 * ```
 */
export class BonuslyClient extends RequestClient {
  /** Users of the company. */
  public readonly users: UsersResource;
  /** Bonuses, overall and per user. */
  public readonly bonuses: BonusesResource;
  /** Registered webhooks. */
  public readonly webhooks: WebhooksResource;
  /** The token's company. */
  public readonly company: CompanyResource;

  constructor(props: RequestClientProps) {
    super(props);

    this.users = new UsersResource(this);
    this.bonuses = new BonusesResource(this);
    this.webhooks = new WebhooksResource(this);
    this.company = new CompanyResource(this);
  }

  /**
   * Creates a client from the environment and the optional dotenv settings file.
   * This is the only place settings are read; a missing or invalid token is returned as an error.
   */
  static fromEnv({ env, envFile, overrides, ...props }: FromEnvOptions = {}): SafeWrap<Error, BonuslyClient> {
    const [errConfig, config] = loadConfig({ env, envFile, overrides });
    if (errConfig) {
      return [errConfig, null];
    }

    return safeWrap(() => new BonuslyClient({ ...props, ...config }));
  }
}
