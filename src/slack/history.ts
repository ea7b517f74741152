import { createChildLogger } from '../config/logger.js';
import { bearerHeaders } from './credentials.js';
import { SLACK_ENDPOINTS } from './endpoints.js';
import { SlackApiError, SlackDataError, SlackProtocolError, SlackTransportError } from './errors.js';
import { apiErrorOf, describeStatus, readJson, slackFetch, type SlackRequestOptions } from './http.js';
import { isJsonObject, type JsonObject } from './json.js';

const log = createChildLogger('slack-history');

/**
 * Fetch the one message at `ts` in `channel`. The window is inclusive and
 * limited to a single message, so anything other than exactly one match
 * means the timestamp does not identify a message.
 */
export async function getSlackMessage(
  token: string,
  channel: string,
  ts: string,
  options: SlackRequestOptions = {},
): Promise<JsonObject> {
  const query = new URLSearchParams({
    channel,
    ts,
    limit: '1',
    inclusive: 'true',
  });

  const response = await slackFetch(
    `${SLACK_ENDPOINTS.conversationsHistory}?${query.toString()}`,
    {
      method: 'GET',
      headers: {
        'Content-Type': 'application/json; charset=UTF-8',
        Accept: 'application/json',
        ...bearerHeaders(token),
      },
    },
    'conversations.history',
    options,
  );

  if (response.status !== 200) {
    throw new SlackTransportError(`failed to get slack message: ${describeStatus(response)}`, response.status);
  }

  const data = await readJson(response);
  if (data.ok === false) {
    throw new SlackApiError(`failed to get slack message: ${JSON.stringify(data)}`, apiErrorOf(data));
  }

  const messages = data.messages;
  if (!Array.isArray(messages)) {
    throw new SlackProtocolError('conversations.history response has no messages list');
  }
  if (messages.length < 1) {
    throw new SlackDataError(`no messages matching ts: ${ts}`);
  }
  if (messages.length > 1) {
    throw new SlackDataError(`more than 1 message matching ts: ${ts}`);
  }

  const [message] = messages;
  if (!isJsonObject(message)) {
    throw new SlackProtocolError('conversations.history returned a message that is not an object');
  }

  log.debug({ channel, ts }, 'Fetched message for edit');
  return message;
}
