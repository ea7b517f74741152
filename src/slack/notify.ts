import { createChildLogger } from '../config/logger.js';
import { classifyToken, obscureTarget, resolveTarget } from './credentials.js';
import { SlackTransportError } from './errors.js';
import { readJson, slackFetch, type SlackRequestOptions } from './http.js';
import type { JsonObject } from './json.js';
import type { SlackPayload } from './payload.js';

const log = createChildLogger('slack-notify');

/** What an incoming webhook "returns": a 200 and nothing else. */
export const WEBHOOK_OK = Object.freeze({ webhook: 'ok' });

/**
 * Post or update a message. The token decides the protocol.
 *
 * WebAPI responses come back parsed and untouched so the caller can read
 * `ok`, `ts`, `channel` and `error`. Webhooks give no body worth reading; a
 * 200 from one yields `{ webhook: 'ok' }`.
 */
export async function notifySlack(
  token: string,
  domain: string | undefined,
  payload: SlackPayload,
  options: SlackRequestOptions = {},
): Promise<JsonObject> {
  const target = resolveTarget(classifyToken(token), payload, domain);
  const shownUrl = obscureTarget(target);
  const data = JSON.stringify(payload);

  const response = await slackFetch(
    target.url,
    { method: 'POST', headers: target.headers, body: data },
    shownUrl,
    options,
  );

  if (response.status !== 200) {
    const body = await response.text().catch(() => '');
    const reason = body || response.statusText || `HTTP ${response.status}`;
    log.warn({ status: response.status, endpoint: shownUrl }, 'Slack rejected message');
    throw new SlackTransportError(`failed to send ${data} to ${shownUrl}: ${reason}`, response.status);
  }

  switch (target.credential.kind) {
    case 'webapi':
      return readJson(response);
    case 'webhook':
    case 'legacy-webhook':
      return { ...WEBHOOK_OK };
  }
}
