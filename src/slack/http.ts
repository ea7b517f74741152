import { Agent, fetch as undiciFetch } from 'undici';
import { createChildLogger } from '../config/logger.js';
import { SlackProtocolError, SlackTransportError, errorMessage } from './errors.js';
import { jsonObjectSchema, type JsonObject } from './json.js';

const log = createChildLogger('slack-http');

export interface SlackRequestOptions {
  /** When false, TLS certificates are not verified. Default: true */
  validateCerts?: boolean;
}

// Only built when a task opts out of certificate checks.
let _insecureAgent: Agent | null = null;

function getInsecureAgent(): Agent {
  if (!_insecureAgent) {
    _insecureAgent = new Agent({ connect: { rejectUnauthorized: false } });
  }
  return _insecureAgent;
}

/** Request shape shared by every Slack call. */
export interface SlackRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string | Buffer;
}

/** The parts of a response the Slack helpers read. */
export type SlackResponse = Pick<Response, 'status' | 'statusText' | 'text'>;

/** Replace every occurrence of `url` so a token embedded in it never reaches error text or logs. */
function withoutUrl(text: string, url: string, label: string): string {
  return url === '' ? text : text.split(url).join(label);
}

/**
 * Issue one request. `label` names the endpoint in error text and logs and
 * must never contain a token.
 *
 * A request that gets no response at all surfaces as a transport error with
 * status -1; any response, whatever its status, is returned for the caller
 * to judge. With `validateCerts: false` the request goes through undici's own
 * fetch and an agent that skips certificate checks.
 */
export async function slackFetch(
  url: string,
  init: SlackRequestInit,
  label: string,
  options: SlackRequestOptions = {},
): Promise<SlackResponse> {
  try {
    const response = options.validateCerts === false
      ? await undiciFetch(url, { ...init, dispatcher: getInsecureAgent() })
      : await fetch(url, init);
    log.debug({ endpoint: label, status: response.status }, 'Slack request completed');
    return response;
  } catch (err) {
    // Node's fetch quotes the full URL in some errors.
    const reason = withoutUrl(errorMessage(err), url, label);
    log.warn({ endpoint: label, reason }, 'Slack request failed');
    throw new SlackTransportError(`Request to ${label} failed: ${reason}`, -1);
  }
}

/** "Not Found (HTTP 404)" */
export function describeStatus(response: SlackResponse): string {
  return `${response.statusText || 'Unknown error'} (HTTP ${response.status})`;
}

/** Parse a WebAPI response body, which is always a JSON object. */
export async function readJson(response: SlackResponse): Promise<JsonObject> {
  let raw: string;
  try {
    raw = await response.text();
  } catch (err) {
    throw new SlackTransportError(`Failed to read the Slack API response: ${errorMessage(err)}`, -1, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new SlackProtocolError(`The Slack API response is not valid JSON: ${raw.slice(0, 200)}`, err);
  }

  const result = jsonObjectSchema.safeParse(parsed);
  if (!result.success) {
    throw new SlackProtocolError(`The Slack API response is not a JSON object: ${raw.slice(0, 200)}`);
  }
  return result.data;
}

/** The `error` field of a failed WebAPI response, if it is a string. */
export function apiErrorOf(body: JsonObject): string | undefined {
  return typeof body.error === 'string' ? body.error : undefined;
}
