/**
 * Trading API (XML) call layer.
 *
 * Authenticates with the OAuth access token via X-EBAY-API-IAF-TOKEN.
 * Responses with Ack=Failure become MarketplaceApiError; auth failures
 * (codes 931/932) surface as status 401 so callers can tell them apart.
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { createLogger } from '../utils/logger';
import { MarketplaceApiError } from '../infra/errors';
import { apiRequest, API_BASE, type MarketplaceEnvironment } from './http';
import { child, children, isNode, text, type XmlNode } from './xml';

const logger = createLogger('marketplace-trading');

const COMPATIBILITY_LEVEL = '1349';
const SITE_ID = '0';
const AUTH_ERROR_CODES = new Set(['931', '932']);

export interface TradingApiOptions {
  environment: MarketplaceEnvironment;
  requestTimeoutMs: number;
}

export type TradingCall = (callName: string, accessToken: string, body: XmlNode) => Promise<XmlNode>;

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
});

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressEmptyNode: true,
});

export function buildTradingRequest(callName: string, body: XmlNode): string {
  const request = {
    [`${callName}Request`]: {
      '@_xmlns': 'urn:ebay:apis:eBLBaseComponents',
      ...body,
    },
  };
  return '<?xml version="1.0" encoding="utf-8"?>\n' + xmlBuilder.build(request);
}

/** Throw for Ack=Failure; warnings pass through. */
export function checkAck(callName: string, response: XmlNode): void {
  if (text(response, 'Ack') !== 'Failure') return;
  const errors = children(response, 'Errors');
  const message = errors.map((e) => text(e, 'LongMessage') ?? text(e, 'ShortMessage')).filter(Boolean).join('; ');
  const code = text(errors[0], 'ErrorCode');
  const status = code !== null && AUTH_ERROR_CODES.has(code) ? 401 : 400;
  throw new MarketplaceApiError(callName, status, `${code ?? 'unknown'}: ${message || 'Unknown API error'}`);
}

export function createTradingCall(options: TradingApiOptions): TradingCall {
  const url = `${API_BASE[options.environment]}/ws/api.dll`;

  return async (callName, accessToken, body) => {
    const response = await apiRequest(callName, url, {
      method: 'POST',
      headers: {
        'Content-Type': 'text/xml',
        'X-EBAY-API-CALL-NAME': callName,
        'X-EBAY-API-SITEID': SITE_ID,
        'X-EBAY-API-COMPATIBILITY-LEVEL': COMPATIBILITY_LEVEL,
        'X-EBAY-API-IAF-TOKEN': accessToken,
      },
      body: buildTradingRequest(callName, body),
      timeoutMs: options.requestTimeoutMs,
    });

    const parsed: unknown = xmlParser.parse(await response.text());
    const result = isNode(parsed) ? child(parsed, `${callName}Response`) : undefined;
    if (!result) {
      throw new MarketplaceApiError(callName, response.status, `missing ${callName}Response element`);
    }
    checkAck(callName, result);
    logger.debug({ callName }, 'Trading call succeeded');
    return result;
  };
}
