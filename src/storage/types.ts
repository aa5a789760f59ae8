import type { ClientCredentials } from '../config.js';
import type { TokenSet } from '../types.js';

/**
 * Holder of one logical client's registration and token material.
 *
 * Single reads and writes are atomic. Read-modify-write sequences (register
 * if absent, refresh if stale) run inside {@link runExclusive}, which a
 * durable implementation must back with a lock of equal strength.
 */
export interface TokenStore {
  getClientCredentials(): Promise<ClientCredentials | undefined>;
  setClientCredentials(credentials: ClientCredentials): Promise<void>;
  getTokens(): Promise<TokenSet | undefined>;
  /** Replace the token set; `undefined` drops it. */
  setTokens(tokens: TokenSet | undefined): Promise<void>;
  /**
   * Run `fn` with exclusive access to this store. Not reentrant: `fn` may
   * call the get/set operations but not `runExclusive` itself.
   */
  runExclusive<T>(fn: () => Promise<T>): Promise<T>;
}
