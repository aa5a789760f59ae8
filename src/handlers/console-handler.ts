import { createInterface } from 'node:readline';
import { CancellationError } from '../errors.js';
import { createLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';
import type { RequestOptions } from '../types.js';
import { abortReason, throwIfAborted } from '../utils/abort.js';
import { parseCallbackInput } from './callback-params.js';
import type { AuthorizationHandler, CallbackResult } from './types.js';

export interface ConsoleAuthorizationHandlerOptions {
  /** Where the pasted redirect URL or code is read from (default: stdin) */
  input?: NodeJS.ReadableStream;
  /** Where the URL and prompt are written (default: stderr) */
  output?: NodeJS.WritableStream;
  prompt?: string;
  logger?: Logger;
}

const DEFAULT_PROMPT =
  'Paste the URL you were redirected to (or just the code): ';

/**
 * Headless variant: prints the authorization URL and reads the redirected URL,
 * a query string or the bare code from a text stream.
 */
export class ConsoleAuthorizationHandler implements AuthorizationHandler {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly prompt: string;
  private readonly logger: Logger;

  constructor(options: ConsoleAuthorizationHandlerOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stderr;
    this.prompt = options.prompt ?? DEFAULT_PROMPT;
    this.logger =
      options.logger?.child({ component: 'ConsoleAuthorizationHandler' }) ??
      createLogger({ component: 'ConsoleAuthorizationHandler' });
  }

  async present(
    authorizationUrl: string,
    options: RequestOptions = {}
  ): Promise<void> {
    throwIfAborted(options.signal, 'present');
    this.output.write(
      `\nOpen this URL in a browser to authorize:\n\n  ${authorizationUrl}\n\n`
    );
  }

  collect(options: RequestOptions = {}): Promise<CallbackResult> {
    const { signal } = options;
    throwIfAborted(signal, 'collect');

    const rl = createInterface({ input: this.input, terminal: false });
    this.output.write(this.prompt);

    return new Promise<CallbackResult>((resolve, reject) => {
      let settled = false;

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        rl.close();
        settle();
      };

      const onAbort = (): void => {
        finish(() => reject(abortReason(signal, 'collect')));
      };

      rl.once('line', (line: string) => {
        finish(() => {
          try {
            resolve(parseCallbackInput(line));
          } catch (error) {
            this.logger.warn('Unusable authorization input', {
              error: error instanceof Error ? error.message : String(error),
            });
            reject(error);
          }
        });
      });

      rl.once('close', () => {
        finish(() =>
          reject(
            new CancellationError(
              'input_closed',
              'Input ended before an authorization code was entered',
              { stage: 'collect' }
            )
          )
        );
      });

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
