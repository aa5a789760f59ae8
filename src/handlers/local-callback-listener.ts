/**
 * Local HTTP listener that receives the authorization redirect.
 *
 * The listener is bound for one attempt only: it starts at `present()` (or
 * `collect()` when the URL is delivered some other way) and is torn down,
 * every open socket included, before `collect()` settles.
 */

import { createServer, type Server } from 'node:http';
import type { Socket } from 'node:net';
import { CancellationError, ConfigurationError, TimeoutError } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import type { RequestOptions } from '../types.js';
import { abortReason, raceAbort, throwIfAborted } from '../utils/abort.js';
import { openBrowser, type BrowserLauncher } from './browser.js';
import { createCallbackRoute, type CallbackOutcome } from './callback-route.js';
import type { AuthorizationHandler, CallbackResult } from './types.js';

export interface LocalCallbackListenerOptions {
  /** Port to listen on (default: 3030; 0 picks a free port) */
  port?: number;
  /** Interface to bind (default: localhost) */
  host?: string;
  /** Redirect path (default: /callback) */
  path?: string;
  /** Wait for the callback before giving up (default: 300000 = 5 minutes) */
  timeoutMs?: number;
  /** Launch the platform browser from `present()` (default: true) */
  openBrowser?: boolean;
  /** Browser launcher, replaceable for tests */
  browserLauncher?: BrowserLauncher;
  /** Where the authorization URL is shown (default: stderr) */
  printUrl?: (url: string) => void;
  logger?: Logger;
}

const DEFAULT_PORT = 3030;
const DEFAULT_HOST = 'localhost';
const DEFAULT_PATH = '/callback';
const DEFAULT_TIMEOUT_MS = 300_000;

const printToStderr = (url: string): void => {
  process.stderr.write(
    `\nOpen this URL in your browser to authorize:\n\n  ${url}\n\n`
  );
};

/**
 * Tail of the claim queue per `host:port`. Listeners in one process take
 * turns on a fixed callback address instead of failing with EADDRINUSE.
 */
const addressClaims = new Map<string, Promise<void>>();

export class LocalCallbackListener implements AuthorizationHandler {
  readonly host: string;
  readonly path: string;
  readonly timeoutMs: number;

  private readonly requestedPort: number;
  private readonly launchBrowser: boolean;
  private readonly browserLauncher: BrowserLauncher;
  private readonly printUrl: (url: string) => void;
  private readonly logger: Logger;

  /** Aborted by close(); cancels a pending claim or bind */
  private cycle?: AbortController;
  private server?: Server;
  private listening?: Promise<void>;
  private closing?: Promise<void>;
  private releaseAddress: () => void = () => undefined;
  private readonly sockets = new Set<Socket>();
  private outcome?: CallbackOutcome;
  private waiter?: (outcome: CallbackOutcome) => void;

  constructor(options: LocalCallbackListenerOptions = {}) {
    this.requestedPort = options.port ?? DEFAULT_PORT;
    this.host = options.host ?? DEFAULT_HOST;
    this.path = options.path ?? DEFAULT_PATH;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.launchBrowser = options.openBrowser ?? true;
    this.browserLauncher = options.browserLauncher ?? openBrowser;
    this.printUrl = options.printUrl ?? printToStderr;
    this.logger =
      options.logger?.child({ component: 'LocalCallbackListener' }) ??
      createLogger({ component: 'LocalCallbackListener' });

    if (
      !Number.isInteger(this.requestedPort) ||
      this.requestedPort < 0 ||
      this.requestedPort > 65535
    ) {
      throw new ConfigurationError(
        `Invalid callback port: ${this.requestedPort}`,
        { stage: 'listen' }
      );
    }
  }

  /**
   * Listener bound to the host, port and path of `redirectUri`.
   */
  static fromRedirectUri(
    redirectUri: string,
    options: Omit<LocalCallbackListenerOptions, 'host' | 'port' | 'path'> = {}
  ): LocalCallbackListener {
    let url: URL;
    try {
      url = new URL(redirectUri);
    } catch (error) {
      throw new ConfigurationError(`Invalid redirect URI: ${redirectUri}`, {
        stage: 'listen',
        cause: error,
      });
    }
    if (url.protocol !== 'http:') {
      throw new ConfigurationError(
        `Local callback listener needs an http:// redirect URI, got ${redirectUri}`,
        { stage: 'listen' }
      );
    }

    return new LocalCallbackListener({
      ...options,
      host: url.hostname.replace(/^\[(.*)\]$/, '$1'),
      port: url.port ? Number(url.port) : 80,
      path: url.pathname || DEFAULT_PATH,
    });
  }

  /**
   * Port the listener is bound to, or the configured one while unbound.
   */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object'
      ? address.port
      : this.requestedPort;
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  async present(
    authorizationUrl: string,
    options: RequestOptions = {}
  ): Promise<void> {
    throwIfAborted(options.signal, 'present');
    try {
      await raceAbort(this.listen(), options.signal, 'present');
    } catch (error) {
      await this.close();
      throw error;
    }

    this.printUrl(authorizationUrl);
    if (!this.launchBrowser) return;

    const opened = await this.browserLauncher(authorizationUrl);
    if (!opened) {
      this.logger.warn(
        'Could not open a browser; open the authorization URL manually',
        { port: this.port, path: this.path }
      );
    }
  }

  async collect(options: RequestOptions = {}): Promise<CallbackResult> {
    throwIfAborted(options.signal, 'collect');

    let outcome: CallbackOutcome;
    try {
      await raceAbort(this.listen(), options.signal, 'collect');
      outcome = await this.waitForOutcome(options.signal);
    } finally {
      await this.close();
    }

    if (outcome.ok) return outcome.result;
    throw outcome.error;
  }

  /**
   * Stop listening and destroy open connections. A bind still in progress is
   * cancelled. Safe to call repeatedly.
   */
  async close(): Promise<void> {
    const cycle = this.cycle;
    if (!cycle) return this.closing;

    const server = this.server;
    const releaseAddress = this.releaseAddress;
    this.cycle = undefined;
    this.server = undefined;
    this.listening = undefined;
    this.waiter = undefined;
    this.releaseAddress = () => undefined;

    cycle.abort(
      new CancellationError('aborted', 'Callback listener closed', {
        stage: 'listen',
      })
    );
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();

    const closing = (server ? shutDown(server) : Promise.resolve()).finally(
      releaseAddress
    );
    this.closing = closing;
    try {
      await closing;
    } finally {
      if (this.closing === closing) this.closing = undefined;
    }
    this.logger.debug('Callback listener closed', { port: this.requestedPort });
  }

  private listen(): Promise<void> {
    if (this.listening) return this.listening;

    this.outcome = undefined;
    const cycle = new AbortController();
    this.cycle = cycle;
    this.listening = this.bind(cycle.signal);
    return this.listening;
  }

  private async bind(cycle: AbortSignal): Promise<void> {
    try {
      await this.claimAddress(cycle);
      await this.startServer(cycle);
    } catch (error) {
      if (!cycle.aborted) {
        // Bind failed on its own; close() has not run for this cycle.
        this.cycle = undefined;
        this.server = undefined;
        this.listening = undefined;
        this.releaseAddress();
        this.releaseAddress = () => undefined;
      }
      throw error;
    }
  }

  private async claimAddress(cycle: AbortSignal): Promise<void> {
    if (this.requestedPort === 0) return;

    const key = `${this.host}:${this.requestedPort}`;
    const previous = addressClaims.get(key);
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail: Promise<void> = (previous ?? Promise.resolve())
      .then(() => released)
      .then(() => {
        if (addressClaims.get(key) === tail) addressClaims.delete(key);
      });
    addressClaims.set(key, tail);
    this.releaseAddress = release;

    if (previous) {
      this.logger.info('Waiting for another listener to release the callback port', {
        host: this.host,
        port: this.requestedPort,
      });
      await raceAbort(previous, cycle, 'listen');
    }
  }

  private startServer(cycle: AbortSignal): Promise<void> {
    throwIfAborted(cycle, 'listen');

    const server = createServer(
      createCallbackRoute({
        path: this.path,
        logger: this.logger,
        onOutcome: (outcome) => this.deliver(outcome),
      })
    );
    server.on('connection', (socket: Socket) => {
      if (this.server !== server) {
        socket.destroy();
        return;
      }
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
    });
    this.server = server;

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        server.off('error', onError);
        reject(abortReason(cycle, 'listen'));
      };
      const onError = (error: NodeJS.ErrnoException): void => {
        cycle.removeEventListener('abort', onAbort);
        this.logger.error('Callback listener could not bind', {
          host: this.host,
          port: this.requestedPort,
          code: error.code,
        });
        reject(
          new ConfigurationError(
            `Cannot listen on ${this.host}:${this.requestedPort} (${error.code ?? error.message})`,
            { stage: 'listen', cause: error }
          )
        );
      };

      server.once('error', onError);
      cycle.addEventListener('abort', onAbort, { once: true });
      server.listen(this.requestedPort, this.host, () => {
        server.off('error', onError);
        cycle.removeEventListener('abort', onAbort);
        if (cycle.aborted) return;
        this.logger.info('Callback listener ready', {
          host: this.host,
          port: this.port,
          path: this.path,
        });
        resolve();
      });
    });
  }

  private deliver(outcome: CallbackOutcome): void {
    if (this.waiter) {
      this.waiter(outcome);
    } else {
      this.outcome = outcome;
    }
  }

  private waitForOutcome(signal?: AbortSignal): Promise<CallbackOutcome> {
    const buffered = this.outcome;
    if (buffered) return Promise.resolve(buffered);
    if (signal?.aborted) return Promise.reject(abortReason(signal, 'collect'));

    return new Promise<CallbackOutcome>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const finish = (settle: () => void): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.waiter = undefined;
        settle();
      };

      const onAbort = (): void => {
        finish(() => reject(abortReason(signal, 'collect')));
      };

      timer = setTimeout(() => {
        this.logger.warn('No authorization callback received in time', {
          timeoutMs: this.timeoutMs,
        });
        finish(() =>
          reject(
            new TimeoutError(
              `No authorization callback received within ${this.timeoutMs}ms`,
              this.timeoutMs,
              { stage: 'collect' }
            )
          )
        );
      }, this.timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = (outcome) => finish(() => resolve(outcome));
    });
  }
}

/**
 * Close `server`, waiting for a bind still in flight to finish first.
 */
function shutDown(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const stop = (): void => {
      server.close((error) => (error ? reject(error) : resolve()));
    };
    if (server.listening) {
      stop();
      return;
    }
    server.once('listening', stop);
    server.once('error', () => resolve());
  });
}
