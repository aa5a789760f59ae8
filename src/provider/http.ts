import { ErrorNormalizer } from '../utils/error-normalizer.js';
import { withDeadline } from '../utils/deadline.js';

export interface RequestContext {
  /** Flow stage recorded on failures */
  stage: string;
  issuer?: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON, the raw text when it is not JSON, undefined when empty */
  body: unknown;
}

/**
 * fetch under a deadline, reading the whole body before the deadline ends.
 * Every failure is normalized into the error taxonomy.
 */
export async function fetchJson(
  url: string,
  init: RequestInit,
  context: RequestContext
): Promise<JsonResponse> {
  const { stage, issuer, timeoutMs, signal } = context;

  try {
    return await withDeadline(
      async (deadlineSignal) => {
        const response = await fetch(url, { ...init, signal: deadlineSignal });
        const text = await response.text();
        return { status: response.status, ok: response.ok, body: parseBody(text) };
      },
      { timeoutMs, signal, stage, endpoint: url }
    );
  } catch (error) {
    throw ErrorNormalizer.normalizeError(error, {
      stage,
      endpoint: url,
      issuer,
      timeoutMs,
    });
  }
}

function parseBody(text: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
