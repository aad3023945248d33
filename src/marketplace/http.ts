/**
 * Shared HTTP plumbing for marketplace calls: bounded timeout, status-code
 * to error-class mapping, JSON body validation.
 */

import type { z } from 'zod';
import { createLogger } from '../utils/logger';
import { RateLimitError, parseRetryAfter } from '../infra/retry';
import { MarketplaceApiError, NotFoundError } from '../infra/errors';

const logger = createLogger('marketplace-http');

export const API_BASE = {
  production: 'https://api.ebay.com',
  sandbox: 'https://api.sandbox.ebay.com',
} as const;

export type MarketplaceEnvironment = keyof typeof API_BASE;

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

/**
 * Perform a request and throw a typed error for anything but 2xx:
 * 404 → NotFoundError, 429 → RateLimitError, otherwise MarketplaceApiError
 * (retryable by status code for 5xx).
 */
export async function apiRequest(operation: string, url: string, options: RequestOptions): Promise<Response> {
  const response = await fetch(url, {
    method: options.method ?? 'GET',
    headers: options.headers,
    body: options.body,
    signal: AbortSignal.timeout(options.timeoutMs),
  });

  if (response.ok) return response;

  const errorText = await response.text();
  logger.warn({ operation, status: response.status, error: errorText.slice(0, 300) }, 'Marketplace request failed');

  if (response.status === 404) {
    throw new NotFoundError(`${operation}: not found`);
  }
  if (response.status === 429) {
    throw new RateLimitError(`${operation}: rate limited`, 429, parseRetryAfter(response.headers) ?? undefined);
  }
  throw new MarketplaceApiError(operation, response.status, errorText);
}

/** Request and validate the JSON response body. */
export async function apiJson<T>(
  operation: string,
  url: string,
  options: RequestOptions,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  const response = await apiRequest(operation, url, options);
  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new MarketplaceApiError(operation, response.status, `unexpected response shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function bearer(accessToken: string): Record<string, string> {
  return { Authorization: `Bearer ${accessToken}` };
}
