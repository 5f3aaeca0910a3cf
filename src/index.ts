import { UniFiControllerClient } from './local/client.js';
import { UnknownQueryError, describeFailure } from './local/errors.js';
import { isQueryName } from './local/queries.js';
import { ControllerClientConfig, QueryOptions, QueryOutcome, Session } from './types/index.js';

/**
 * One-shot entry point for automation hosts: log in, run a single query,
 * log out. Failures come back as descriptors rather than exceptions.
 */
export class UniFiFacts {
  private client: UniFiControllerClient;
  private site: string;

  constructor(config: ControllerClientConfig) {
    this.client = new UniFiControllerClient(config);
    this.site = config.site;
  }

  async query(query: string, options: QueryOptions = {}): Promise<QueryOutcome> {
    if (!isQueryName(query)) {
      return { success: false, query, error: new UnknownQueryError(query).toDescriptor() };
    }

    let session: Session | undefined;
    try {
      session = await this.client.login();
      const data = await this.client.execute(session, query, this.site, options);
      return { success: true, query, data };
    } catch (error) {
      return { success: false, query, error: describeFailure(error) };
    } finally {
      if (session) {
        await this.client.logout(session);
      }
    }
  }
}

// Export all types and clients
export * from './types/index.js';
export * from './local/errors.js';
export { UniFiControllerClient } from './local/client.js';
export { QUERIES, QUERY_NAMES, DEFAULT_QUERY, isQueryName, buildQueryRequest } from './local/queries.js';
export type { QueryName, QueryDescriptor } from './local/queries.js';
export { parseEnvelope } from './local/envelope.js';
export {
  ConfigurationError,
  ConnectionParametersSchema,
  loadControllerConfig,
  parseQueryOptions,
} from './config.js';
