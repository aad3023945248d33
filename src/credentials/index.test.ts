import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { createInMemoryDatabase, type Database } from '../db/index';
import { str } from '../db/rows';
import { createNotificationService, type NotificationService } from '../notifications/index';
import { MarketplaceApiError, CredentialError } from '../infra/errors';
import { TransientError } from '../infra/retry';
import type { RefreshedToken, TokenRefresher } from '../marketplace/auth';
import { createCredentialVault, decrypt, encrypt, type CredentialVault } from './index';

const HOUR = 60 * 60 * 1000;
const T0 = Date.parse('2024-06-01T00:00:00.000Z');

describe('encrypt/decrypt', () => {
  it('round-trips and uses a fresh salt each time', () => {
    const a = encrypt('access-token-1');
    const b = encrypt('access-token-1');
    expect(a).not.toBe(b);
    expect(a.startsWith('v2:')).toBe(true);
    expect(decrypt(a)).toBe('access-token-1');
  });

  it('rejects unknown formats', () => {
    expect(() => decrypt('plain-text')).toThrow('unsupported format');
  });
});

describe('CredentialVault', () => {
  let db: Database;
  let notifications: NotificationService;
  let now: number;
  let refresh: Mock<Parameters<TokenRefresher>, Promise<RefreshedToken>>;
  let vault: CredentialVault;

  beforeEach(async () => {
    db = await createInMemoryDatabase();
    notifications = createNotificationService(db);
    now = T0;
    refresh = vi.fn<Parameters<TokenRefresher>, Promise<RefreshedToken>>();
    vault = createCredentialVault(db, { refresh, notifications, clock: () => now });
    vault.storeCredential('u1', {
      marketplaceUserId: 'Seller_One',
      accessToken: 'access-1',
      refreshToken: 'refresh-1',
      expiresAt: T0 + 2 * HOUR,
    });
  });

  it('never stores tokens in plaintext', () => {
    const row = db.get('SELECT encrypted_access_token, encrypted_refresh_token FROM marketplace_credentials');
    expect(row).toBeDefined();
    if (row) {
      expect(str(row, 'encrypted_access_token')).not.toContain('access-1');
      expect(str(row, 'encrypted_refresh_token')).not.toContain('refresh-1');
    }
  });

  it('returns the stored token while it is fresh', async () => {
    const credential = vault.getCredential('u1');
    expect(credential.marketplaceUserId).toBe('Seller_One');
    await expect(credential.getAccessToken()).resolves.toBe('access-1');
    expect(refresh).not.toHaveBeenCalled();
  });

  it('refreshes within five minutes of expiry and persists the new token', async () => {
    refresh.mockResolvedValueOnce({ accessToken: 'access-2', refreshToken: null, expiresAt: T0 + 4 * HOUR });
    now = T0 + 2 * HOUR - 4 * 60 * 1000;

    const credential = vault.getCredential('u1');
    await expect(credential.getAccessToken()).resolves.toBe('access-2');
    expect(refresh).toHaveBeenCalledWith('refresh-1', now);

    await expect(credential.getAccessToken()).resolves.toBe('access-2');
    expect(refresh).toHaveBeenCalledTimes(1);
    expect(vault.describe('u1')?.accessExpiresAt).toBe(T0 + 4 * HOUR);
  });

  it('shares one refresh between concurrent callers', async () => {
    refresh.mockResolvedValue({ accessToken: 'access-2', refreshToken: 'refresh-2', expiresAt: T0 + 4 * HOUR });
    now = T0 + 3 * HOUR;

    const credential = vault.getCredential('u1');
    const tokens = await Promise.all([credential.getAccessToken(), credential.getAccessToken()]);
    expect(tokens).toEqual(['access-2', 'access-2']);
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it('flips to reconnect_required and notifies once when the grant is revoked', async () => {
    refresh.mockRejectedValue(new MarketplaceApiError('token refresh', 400, '{"error":"invalid_grant"}'));
    now = T0 + 3 * HOUR;

    await expect(vault.getCredential('u1').getAccessToken()).rejects.toBeInstanceOf(CredentialError);
    expect(vault.describe('u1')?.status).toBe('reconnect_required');
    expect(() => vault.getCredential('u1')).toThrow(CredentialError);
    expect(vault.listActiveUsers()).toEqual([]);

    const sent = notifications.list('u1');
    expect(sent).toHaveLength(1);
    expect(sent[0].title).toBe('Reconnect required');
    expect(sent[0].type).toBe('error');
  });

  it('keeps the credential active on a transient refresh failure', async () => {
    refresh.mockRejectedValue(new TransientError('fetch failed'));
    now = T0 + 3 * HOUR;

    await expect(vault.getCredential('u1').getAccessToken()).rejects.toBeInstanceOf(TransientError);
    expect(vault.describe('u1')?.status).toBe('active');
    expect(notifications.list('u1')).toEqual([]);
  });

  it('treats an undecryptable credential as reconnect required', async () => {
    db.run("UPDATE marketplace_credentials SET encrypted_access_token = 'v2:00:00:00:00' WHERE user_id = 'u1'");

    await expect(vault.getCredential('u1').getAccessToken()).rejects.toBeInstanceOf(CredentialError);
    expect(vault.describe('u1')?.status).toBe('reconnect_required');
  });

  it('reactivates on a fresh store', () => {
    db.run("UPDATE marketplace_credentials SET status = 'reconnect_required' WHERE user_id = 'u1'");
    vault.storeCredential('u1', {
      marketplaceUserId: 'Seller_One',
      accessToken: 'access-9',
      refreshToken: 'refresh-9',
      expiresAt: T0 + HOUR,
    });
    expect(vault.describe('u1')?.status).toBe('active');
  });

  it('resolves users by seller name case-insensitively', () => {
    expect(vault.resolveUserByMarketplaceUser('seller_one')).toBe('u1');
    expect(vault.resolveUserByMarketplaceUser(' SELLER_ONE ')).toBe('u1');
    expect(vault.resolveUserByMarketplaceUser('someone_else')).toBeNull();
  });

  it('throws for unknown users and deletes on disconnect', () => {
    expect(() => vault.getCredential('nobody')).toThrow('No credential stored for nobody');
    expect(vault.deleteCredential('u1')).toBe(true);
    expect(vault.deleteCredential('u1')).toBe(false);
    expect(vault.resolveUserByMarketplaceUser('seller_one')).toBeNull();
  });
});
