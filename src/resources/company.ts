import type { RequestClient } from '../core/client.js';
import type { CallOptions } from '../core/types.js';
import { type Company, companySchema } from '../models/company.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * The company behind the access token.
 */
export class CompanyResource {
  readonly #client: RequestClient;

  constructor(client: RequestClient) {
    this.#client = client;
  }

  get(opts?: CallOptions): SafeWrapAsync<Error, Company> {
    return this.#client.get('/companies/show', companySchema, undefined, opts);
  }
}
