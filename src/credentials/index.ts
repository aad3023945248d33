/**
 * Credential Vault - per-user marketplace OAuth tokens
 *
 * AES-256-GCM encryption with scrypt key derivation. Tokens are stored
 * encrypted and only ever leave the vault through a capability whose
 * getAccessToken() decrypts, refreshes when close to expiry, and
 * re-encrypts. The encryption key is read lazily from
 * MARKETSYNC_CREDENTIAL_KEY so it can be provided after import.
 */

import * as crypto from 'crypto';
import type { Database, Row } from '../db/index';
import { num, oneOf, str } from '../db/rows';
import { createLogger } from '../utils/logger';
import { CredentialError, errorMessage } from '../infra/errors';
import { isTransientError } from '../infra/retry';
import { EXPIRY_BUFFER_MS, type TokenRefresher } from '../marketplace/auth';
import type { NotificationService } from '../notifications/index';

const logger = createLogger('credentials');

// ---------------------------------------------------------------------------
// Encryption primitives
// ---------------------------------------------------------------------------

const ENCRYPTION_ALGORITHM = 'aes-256-gcm';
const VERSION_PREFIX = 'v2';

/** Read the encryption key lazily at call time (not at import time). */
function getEncryptionKey(): string | undefined {
  return process.env.MARKETSYNC_CREDENTIAL_KEY;
}

function requireEncryptionKey(): string {
  const key = getEncryptionKey();
  if (!key || key.trim().length === 0) {
    throw new Error(
      'MARKETSYNC_CREDENTIAL_KEY is required for credential encryption. ' +
        'Set it as an environment variable (min 16 chars recommended).',
    );
  }
  return key;
}

/**
 * Encrypt a plaintext string.
 * Returns `v2:<salt_hex>:<iv_hex>:<authTag_hex>:<ciphertext_hex>`.
 */
export function encrypt(data: string): string {
  const encKey = requireEncryptionKey();
  const salt = crypto.randomBytes(16);
  const key = crypto.scryptSync(encKey, salt, 32);
  const iv = crypto.randomBytes(12);
  const cipher = crypto.createCipheriv(ENCRYPTION_ALGORITHM, key, iv);
  let encrypted = cipher.update(data, 'utf8', 'hex');
  encrypted += cipher.final('hex');
  const authTag = cipher.getAuthTag();
  return [VERSION_PREFIX, salt.toString('hex'), iv.toString('hex'), authTag.toString('hex'), encrypted].join(':');
}

/**
 * Decrypt a string produced by `encrypt()`.
 * Expects the `v2:salt:iv:authTag:ciphertext` format.
 */
export function decrypt(encryptedData: string): string {
  const encKey = requireEncryptionKey();
  const parts = encryptedData.split(':');

  if (parts[0] !== VERSION_PREFIX || parts.length < 5) {
    throw new Error('Invalid encrypted credential payload (unsupported format)');
  }

  const [, saltHex, ivHex, authTagHex, ciphertext] = parts;
  const salt = Buffer.from(saltHex, 'hex');
  const iv = Buffer.from(ivHex, 'hex');
  const authTag = Buffer.from(authTagHex, 'hex');
  const key = crypto.scryptSync(encKey, salt, 32);
  const decipher = crypto.createDecipheriv(ENCRYPTION_ALGORITHM, key, iv);
  decipher.setAuthTag(authTag);
  let decrypted = decipher.update(ciphertext, 'hex', 'utf8');
  decrypted += decipher.final('utf8');
  return decrypted;
}

// ---------------------------------------------------------------------------
// Vault interface
// ---------------------------------------------------------------------------

export type CredentialStatus = 'active' | 'reconnect_required';

const CREDENTIAL_STATUSES: readonly CredentialStatus[] = ['active', 'reconnect_required'];

export interface StoreCredentialInput {
  marketplaceUserId: string;
  accessToken: string;
  refreshToken: string;
  /** Access token expiry, epoch ms. */
  expiresAt: number;
}

/** The only handle through which a usable token can be obtained. */
export interface MarketplaceCredential {
  readonly userId: string;
  readonly marketplaceUserId: string;
  getAccessToken(): Promise<string>;
}

export interface CredentialSummary {
  userId: string;
  marketplaceUserId: string;
  status: CredentialStatus;
  accessExpiresAt: number;
  updatedAt: number;
}

export interface CredentialVault {
  /** Store (or overwrite) the tokens for a user; resets status to active. */
  storeCredential(userId: string, input: StoreCredentialInput): void;

  /** Capability for an active credential. Throws CredentialError otherwise. */
  getCredential(userId: string): MarketplaceCredential;

  /** Map a seller name from an inbound event to our user (case-insensitive). */
  resolveUserByMarketplaceUser(marketplaceUserId: string): string | null;

  deleteCredential(userId: string): boolean;

  /** Users with an active credential. */
  listActiveUsers(): string[];

  describe(userId: string): CredentialSummary | null;
}

export interface CredentialVaultOptions {
  refresh: TokenRefresher;
  notifications: NotificationService;
  clock?: () => number;
}

function parseSummary(row: Row): CredentialSummary {
  return {
    userId: str(row, 'user_id'),
    marketplaceUserId: str(row, 'marketplace_user_id'),
    status: oneOf(row, 'status', CREDENTIAL_STATUSES),
    accessExpiresAt: num(row, 'access_expires_at'),
    updatedAt: num(row, 'updated_at'),
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createCredentialVault(db: Database, options: CredentialVaultOptions): CredentialVault {
  const clock = options.clock ?? Date.now;
  const inflightRefresh = new Map<string, Promise<string>>();

  if (!getEncryptionKey()?.trim()) {
    logger.warn('MARKETSYNC_CREDENTIAL_KEY is not set. Credential operations will fail until it is provided.');
  }

  /** Flip to reconnect_required and tell the user, once per transition. */
  function markReconnectRequired(userId: string, reason: string): CredentialError {
    const changed = db.run(
      "UPDATE marketplace_credentials SET status = 'reconnect_required', updated_at = ? WHERE user_id = ? AND status = 'active'",
      [clock(), userId],
    );
    if (changed > 0) {
      logger.warn({ userId, reason }, 'Credential needs reconnect');
      options.notifications.notify(userId, {
        type: 'error',
        title: 'Reconnect required',
        message: 'Your marketplace connection has expired or was revoked. Reconnect your account to resume syncing.',
        source: 'credentials',
      });
    }
    return new CredentialError(userId, `Credential for ${userId} requires reconnect: ${reason}`);
  }

  function readTokens(userId: string): { accessToken: string; refreshToken: string; expiresAt: number } {
    const row = db.get(
      'SELECT encrypted_access_token, encrypted_refresh_token, access_expires_at, status FROM marketplace_credentials WHERE user_id = ?',
      [userId],
    );
    if (!row) throw new CredentialError(userId, `No credential stored for ${userId}`);
    if (oneOf(row, 'status', CREDENTIAL_STATUSES) !== 'active') {
      throw new CredentialError(userId, `Credential for ${userId} requires reconnect`);
    }
    try {
      return {
        accessToken: decrypt(str(row, 'encrypted_access_token')),
        refreshToken: decrypt(str(row, 'encrypted_refresh_token')),
        expiresAt: num(row, 'access_expires_at'),
      };
    } catch (err) {
      logger.error({ userId, err }, 'Failed to decrypt credential');
      throw markReconnectRequired(userId, 'undecryptable credential');
    }
  }

  async function refresh(userId: string, refreshToken: string): Promise<string> {
    const now = clock();
    try {
      const refreshed = await options.refresh(refreshToken, now);
      db.run(
        `UPDATE marketplace_credentials
         SET encrypted_access_token = ?, encrypted_refresh_token = ?, access_expires_at = ?, updated_at = ?
         WHERE user_id = ?`,
        [encrypt(refreshed.accessToken), encrypt(refreshed.refreshToken ?? refreshToken), refreshed.expiresAt, now, userId],
      );
      logger.info({ userId, expiresAt: refreshed.expiresAt }, 'Access token refreshed');
      return refreshed.accessToken;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (isTransientError(error)) {
        logger.warn({ userId, error: error.message }, 'Token refresh failed transiently');
        throw error;
      }
      throw markReconnectRequired(userId, errorMessage(err));
    }
  }

  async function getAccessToken(userId: string): Promise<string> {
    const tokens = readTokens(userId);
    if (clock() < tokens.expiresAt - EXPIRY_BUFFER_MS) {
      return tokens.accessToken;
    }

    const pending = inflightRefresh.get(userId);
    if (pending) return pending;

    const promise = refresh(userId, tokens.refreshToken).finally(() => {
      inflightRefresh.delete(userId);
    });
    inflightRefresh.set(userId, promise);
    return promise;
  }

  return {
    storeCredential(userId, input) {
      const now = clock();
      db.run(
        `INSERT INTO marketplace_credentials
           (user_id, marketplace_user_id, encrypted_access_token, encrypted_refresh_token, access_expires_at, status, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, 'active', ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           marketplace_user_id = excluded.marketplace_user_id,
           encrypted_access_token = excluded.encrypted_access_token,
           encrypted_refresh_token = excluded.encrypted_refresh_token,
           access_expires_at = excluded.access_expires_at,
           status = 'active',
           updated_at = excluded.updated_at`,
        [userId, input.marketplaceUserId, encrypt(input.accessToken), encrypt(input.refreshToken), input.expiresAt, now, now],
      );
      logger.info({ userId, marketplaceUserId: input.marketplaceUserId }, 'Stored credential');
    },

    getCredential(userId) {
      const row = db.get('SELECT marketplace_user_id, status FROM marketplace_credentials WHERE user_id = ?', [userId]);
      if (!row) throw new CredentialError(userId, `No credential stored for ${userId}`);
      if (oneOf(row, 'status', CREDENTIAL_STATUSES) !== 'active') {
        throw new CredentialError(userId, `Credential for ${userId} requires reconnect`);
      }
      return {
        userId,
        marketplaceUserId: str(row, 'marketplace_user_id'),
        getAccessToken: () => getAccessToken(userId),
      };
    },

    resolveUserByMarketplaceUser(marketplaceUserId) {
      const row = db.get(
        'SELECT user_id FROM marketplace_credentials WHERE lower(marketplace_user_id) = lower(?) ORDER BY updated_at DESC LIMIT 1',
        [marketplaceUserId.trim()],
      );
      return row ? str(row, 'user_id') : null;
    },

    deleteCredential(userId) {
      const deleted = db.run('DELETE FROM marketplace_credentials WHERE user_id = ?', [userId]) > 0;
      if (deleted) logger.info({ userId }, 'Deleted credential');
      return deleted;
    },

    listActiveUsers() {
      return db
        .query("SELECT user_id FROM marketplace_credentials WHERE status = 'active' ORDER BY user_id")
        .map((row) => str(row, 'user_id'));
    },

    describe(userId) {
      const row = db.get(
        'SELECT user_id, marketplace_user_id, status, access_expires_at, updated_at FROM marketplace_credentials WHERE user_id = ?',
        [userId],
      );
      return row ? parseSummary(row) : null;
    },
  };
}
