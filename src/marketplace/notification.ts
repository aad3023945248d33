/**
 * Notification API - push destinations and topic subscriptions
 *
 * Endpoints:
 * - POST   /commerce/notification/v1/destination         create webhook destination
 * - POST   /commerce/notification/v1/subscription        create topic subscription
 * - PUT    /commerce/notification/v1/subscription/{id}   re-enable (renew) a subscription
 * - DELETE /commerce/notification/v1/subscription/{id}   delete a subscription
 * - Trading SetNotificationPreferences                   legacy XML platform notifications
 */

import { createLogger } from '../utils/logger';
import { MarketplaceApiError } from '../infra/errors';
import { apiRequest, bearer, API_BASE, type MarketplaceEnvironment } from './http';
import { createTradingCall, type TradingCall } from './trading';

const logger = createLogger('marketplace-notification');

export interface CreateDestinationParams {
  name: string;
  endpoint: string;
  verificationToken: string;
}

export interface CreateSubscriptionParams {
  topicId: string;
  destinationId: string;
}

export interface NotificationPreferencesParams {
  applicationUrl: string;
  events: string[];
  enable: boolean;
}

export interface NotificationClient {
  createDestination(accessToken: string, params: CreateDestinationParams): Promise<string>;
  createSubscription(accessToken: string, params: CreateSubscriptionParams): Promise<string>;
  renewSubscription(accessToken: string, subscriptionId: string, destinationId: string): Promise<void>;
  /** Rejects with NotFoundError when the subscription no longer exists. */
  deleteSubscription(accessToken: string, subscriptionId: string): Promise<void>;
  setNotificationPreferences(accessToken: string, params: NotificationPreferencesParams): Promise<void>;
}

export interface NotificationClientOptions {
  environment: MarketplaceEnvironment;
  requestTimeoutMs: number;
  tradingCall?: TradingCall;
}

const JSON_PAYLOAD = { format: 'JSON', schemaVersion: '1.0', deliveryProtocol: 'HTTPS' };

/** Created resources are identified by the last segment of the Location header. */
export function idFromLocation(operation: string, response: Response): string {
  const location = response.headers.get('location') ?? '';
  const id = location.split('/').pop() ?? '';
  if (!id) throw new MarketplaceApiError(operation, response.status, 'no Location header on created resource');
  return id;
}

export function createNotificationClient(options: NotificationClientOptions): NotificationClient {
  const baseUrl = `${API_BASE[options.environment]}/commerce/notification/v1`;
  const trading = options.tradingCall ?? createTradingCall(options);
  const timeoutMs = options.requestTimeoutMs;

  function jsonHeaders(accessToken: string): Record<string, string> {
    return { ...bearer(accessToken), 'Content-Type': 'application/json' };
  }

  return {
    async createDestination(accessToken, params) {
      const response = await apiRequest('create destination', `${baseUrl}/destination`, {
        method: 'POST',
        headers: jsonHeaders(accessToken),
        body: JSON.stringify({
          name: params.name,
          status: 'ENABLED',
          deliveryConfig: { endpoint: params.endpoint, verificationToken: params.verificationToken },
        }),
        timeoutMs,
      });
      const destinationId = idFromLocation('create destination', response);
      logger.info({ destinationId, name: params.name }, 'Notification destination created');
      return destinationId;
    },

    async createSubscription(accessToken, params) {
      const response = await apiRequest('create subscription', `${baseUrl}/subscription`, {
        method: 'POST',
        headers: jsonHeaders(accessToken),
        body: JSON.stringify({
          topicId: params.topicId,
          status: 'ENABLED',
          destinationId: params.destinationId,
          payload: JSON_PAYLOAD,
        }),
        timeoutMs,
      });
      const subscriptionId = idFromLocation('create subscription', response);
      logger.info({ subscriptionId, topicId: params.topicId }, 'Subscription created');
      return subscriptionId;
    },

    async renewSubscription(accessToken, subscriptionId, destinationId) {
      await apiRequest('renew subscription', `${baseUrl}/subscription/${encodeURIComponent(subscriptionId)}`, {
        method: 'PUT',
        headers: jsonHeaders(accessToken),
        body: JSON.stringify({ status: 'ENABLED', destinationId, payload: JSON_PAYLOAD }),
        timeoutMs,
      });
    },

    async deleteSubscription(accessToken, subscriptionId) {
      await apiRequest('delete subscription', `${baseUrl}/subscription/${encodeURIComponent(subscriptionId)}`, {
        method: 'DELETE',
        headers: bearer(accessToken),
        timeoutMs,
      });
    },

    async setNotificationPreferences(accessToken, params) {
      const eventEnable = params.enable ? 'Enable' : 'Disable';
      await trading('SetNotificationPreferences', accessToken, {
        ApplicationDeliveryPreferences: {
          ApplicationURL: params.applicationUrl,
          ApplicationEnable: eventEnable,
          DeviceType: 'Platform',
        },
        UserDeliveryPreferenceArray: {
          NotificationEnable: params.events.map((eventType) => ({ EventType: eventType, EventEnable: eventEnable })),
        },
      });
      logger.info({ events: params.events, enable: params.enable }, 'Notification preferences updated');
    },
  };
}
