import type { RequestOptions } from '../types.js';

/**
 * Authorization code and echoed state taken from a callback.
 */
export type CallbackResult = {
  code: string;
  /** Absent when the server did not echo one */
  state?: string;
};

/**
 * Strategy for the interactive step of the authorization code flow: deliver
 * the authorization URL to whoever must visit it, then wait for the code.
 *
 * Both operations honour `options.signal`; when it aborts they reject with
 * the signal's reason.
 */
export interface AuthorizationHandler {
  /** Surface the URL. Must not complete the flow itself. */
  present(authorizationUrl: string, options?: RequestOptions): Promise<void>;
  /** Wait for the authorization code and echoed state. */
  collect(options?: RequestOptions): Promise<CallbackResult>;
  /** Release resources held for the attempt. Called after every attempt. */
  close?(): Promise<void>;
}
