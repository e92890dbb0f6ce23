/**
 * JSON-over-HTTP helper shared by the hosted provider adapters.
 *
 * One request per call with a timeout; no retries. Deciding whether to
 * retry is left to whoever runs the review loop.
 */

import { ErrorCategory, ProviderError, toError } from '../errors/index.js';

export const DEFAULT_TIMEOUT_MS = 120_000;

export interface PostJsonOptions {
  url: string;
  headers: Record<string, string>;
  body: unknown;
  providerName: string;
  timeoutMs?: number;
}

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * @throws ProviderError on network failure, timeout, non-2xx status or an
 * unparseable body
 */
export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { url, headers, body, providerName } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (error) {
    const err = toError(error);
    const message =
      err.name === 'TimeoutError'
        ? `Request to ${providerName} timed out`
        : `Request to ${providerName} failed: ${err.message}`;
    throw new ProviderError(message, ErrorCategory.TRANSIENT, true, providerName, undefined, err);
  }

  if (!response.ok) {
    throw ProviderError.fromStatus(providerName, response.status, await response.text());
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderError(
      `Invalid JSON from ${providerName}`,
      ErrorCategory.PERMANENT,
      false,
      providerName,
      response.status,
      toError(error)
    );
  }
}
