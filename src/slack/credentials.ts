import {
  OBSCURED_WEBHOOK_URL,
  SLACK_ENDPOINTS,
  incomingWebhookUrl,
  legacyWebhookUrl,
} from './endpoints.js';
import { SlackConfigError } from './errors.js';

// ─── Credential classification ──────────────────────────────────────

/**
 * Which wire protocol a token speaks. The shape of the token is the only
 * signal Slack gives us:
 *
 * - `webhook`: new-style incoming webhook path, `T000/B000/XXXX`
 * - `webapi`: bot, user or app token, `xoxb-…`, `xoxp-…`, `xoxa-…`
 * - `legacy-webhook`: anything else; needs the workspace domain
 */
export type SlackCredential =
  | { kind: 'webhook'; token: string }
  | { kind: 'webapi'; token: string }
  | { kind: 'legacy-webhook'; token: string };

export type SlackCredentialKind = SlackCredential['kind'];

const WEBAPI_TOKEN_PATTERN = /^xox[abp]-\S+$/;

/** First match wins: slash count, then the WebAPI prefix, then legacy. */
export function classifyToken(token: string): SlackCredential {
  const slashes = token.split('/').length - 1;
  if (slashes >= 2) {
    return { kind: 'webhook', token };
  }
  if (WEBAPI_TOKEN_PATTERN.test(token)) {
    return { kind: 'webapi', token };
  }
  return { kind: 'legacy-webhook', token };
}

export function bearerHeaders(token: string): Record<string, string> {
  return { Authorization: `Bearer ${token}` };
}

// ─── Endpoint selection ─────────────────────────────────────────────

export interface SlackTarget {
  credential: SlackCredential;
  url: string;
  headers: Record<string, string>;
}

const JSON_HEADERS = {
  'Content-Type': 'application/json; charset=UTF-8',
  Accept: 'application/json',
} as const;

/**
 * Pick the URL and headers for posting `payload`. A WebAPI payload that
 * carries `ts` edits that message in place.
 */
export function resolveTarget(
  credential: SlackCredential,
  payload: { ts?: string },
  domain?: string,
): SlackTarget {
  switch (credential.kind) {
    case 'webhook':
      return {
        credential,
        url: incomingWebhookUrl(credential.token),
        headers: { ...JSON_HEADERS },
      };
    case 'webapi':
      return {
        credential,
        url: payload.ts !== undefined ? SLACK_ENDPOINTS.updateMessage : SLACK_ENDPOINTS.postMessage,
        headers: { ...JSON_HEADERS, ...bearerHeaders(credential.token) },
      };
    case 'legacy-webhook':
      if (!domain) {
        throw new SlackConfigError(
          'Slack has updated its webhook API. You need to specify a token of the form XXXX/YYYY/ZZZZ',
        );
      }
      return {
        credential,
        url: legacyWebhookUrl(domain, credential.token),
        headers: { ...JSON_HEADERS },
      };
  }
}

/** URL safe to put in an error message. Webhook URLs embed the token. */
export function obscureTarget(target: SlackTarget): string {
  switch (target.credential.kind) {
    case 'webapi':
      return target.url;
    case 'webhook':
    case 'legacy-webhook':
      return OBSCURED_WEBHOOK_URL;
  }
}
