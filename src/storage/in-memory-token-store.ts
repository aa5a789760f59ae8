import type { ClientCredentials } from '../config.js';
import type { TokenSet } from '../types.js';
import { SerialLock } from '../utils/serial-lock.js';
import type { TokenStore } from './types.js';

export interface InMemoryTokenStoreOptions {
  /** Credentials obtained out of band; registration is skipped when set */
  clientCredentials?: ClientCredentials;
  tokens?: TokenSet;
}

/**
 * Process-memory {@link TokenStore}. Values are copied on the way in and out,
 * so callers never hold a reference to stored state.
 */
export class InMemoryTokenStore implements TokenStore {
  private clientCredentials?: ClientCredentials;
  private tokens?: TokenSet;
  private readonly lock = new SerialLock();

  constructor(options: InMemoryTokenStoreOptions = {}) {
    if (options.clientCredentials) {
      this.clientCredentials = structuredClone(options.clientCredentials);
    }
    if (options.tokens) {
      this.tokens = structuredClone(options.tokens);
    }
  }

  async getClientCredentials(): Promise<ClientCredentials | undefined> {
    return this.clientCredentials && structuredClone(this.clientCredentials);
  }

  async setClientCredentials(credentials: ClientCredentials): Promise<void> {
    this.clientCredentials = structuredClone(credentials);
  }

  async getTokens(): Promise<TokenSet | undefined> {
    return this.tokens && structuredClone(this.tokens);
  }

  async setTokens(tokens: TokenSet | undefined): Promise<void> {
    this.tokens = tokens && structuredClone(tokens);
  }

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.run(fn);
  }
}
