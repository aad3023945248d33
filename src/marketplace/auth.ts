/**
 * OAuth token refresh for seller credentials.
 *
 * Access tokens expire in ~2 hours. The vault refreshes 5 minutes before
 * expiry using the long-lived refresh token stored alongside.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { apiJson, API_BASE, type MarketplaceEnvironment } from './http';

const logger = createLogger('marketplace-auth');

/** Buffer before expiry at which we proactively refresh (5 minutes). */
export const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

const SELL_SCOPES = [
  'https://api.ebay.com/oauth/api_scope',
  'https://api.ebay.com/oauth/api_scope/sell.inventory',
  'https://api.ebay.com/oauth/api_scope/sell.fulfillment',
  'https://api.ebay.com/oauth/api_scope/sell.account',
].join(' ');

export interface AppCredentials {
  clientId: string;
  clientSecret: string;
  environment: MarketplaceEnvironment;
  requestTimeoutMs: number;
}

export interface RefreshedToken {
  accessToken: string;
  /** Rotated refresh token, when the token endpoint issues one. */
  refreshToken: string | null;
  expiresAt: number;
}

export type TokenRefresher = (refreshToken: string, now: number) => Promise<RefreshedToken>;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  refresh_token: z.string().optional(),
});

/**
 * Exchange a refresh token for a new access token. 400/401 from the token
 * endpoint mean the grant was revoked; callers treat that as "reconnect".
 */
export async function refreshAccessToken(
  app: AppCredentials,
  refreshToken: string,
  now = Date.now(),
): Promise<RefreshedToken> {
  const basicAuth = Buffer.from(`${app.clientId}:${app.clientSecret}`).toString('base64');
  const body = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
    scope: SELL_SCOPES,
  });

  logger.info({ env: app.environment }, 'Refreshing access token via refresh_token grant');

  const data = await apiJson(
    'token refresh',
    `${API_BASE[app.environment]}/identity/v1/oauth2/token`,
    {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${basicAuth}`,
      },
      body: body.toString(),
      timeoutMs: app.requestTimeoutMs,
    },
    tokenResponseSchema,
  );

  logger.info({ env: app.environment, expiresIn: data.expires_in }, 'Access token refreshed');
  return {
    accessToken: data.access_token,
    refreshToken: data.refresh_token ?? null,
    expiresAt: now + data.expires_in * 1000,
  };
}

export function createTokenRefresher(app: AppCredentials): TokenRefresher {
  return (refreshToken, now) => refreshAccessToken(app, refreshToken, now);
}
