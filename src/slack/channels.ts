import { createChildLogger } from '../config/logger.js';
import { bearerHeaders } from './credentials.js';
import { SLACK_ENDPOINTS } from './endpoints.js';
import { SlackApiError, SlackDataError, SlackTransportError } from './errors.js';
import { apiErrorOf, describeStatus, readJson, slackFetch, type SlackRequestOptions } from './http.js';
import { isJsonObject } from './json.js';

const log = createChildLogger('slack-channels');

const CONVERSATION_TYPES = 'public_channel,private_channel,mpim,im';
const PAGE_SIZE = 1000;

/**
 * Map a channel name to its id by walking conversations.list one page at a
 * time. Stops at the first page holding a match.
 */
export async function resolveChannelId(
  token: string,
  channelName: string,
  options: SlackRequestOptions = {},
): Promise<string> {
  let cursor: string | undefined;
  let pages = 0;

  do {
    const query = new URLSearchParams({
      types: CONVERSATION_TYPES,
      limit: String(PAGE_SIZE),
      exclude_archived: 'true',
    });
    if (cursor) {
      query.set('cursor', cursor);
    }

    const response = await slackFetch(
      `${SLACK_ENDPOINTS.conversationsList}?${query.toString()}`,
      { method: 'GET', headers: bearerHeaders(token) },
      'conversations.list',
      options,
    );
    pages++;

    if (response.status !== 200) {
      throw new SlackTransportError(`Failed to retrieve channels: ${describeStatus(response)}`, response.status);
    }

    const data = await readJson(response);
    if (data.ok !== true) {
      const apiError = apiErrorOf(data);
      throw new SlackApiError(`Slack API error: ${apiError ?? 'Unknown error'}`, apiError);
    }

    const channels = Array.isArray(data.channels) ? data.channels : [];
    for (const channel of channels) {
      if (isJsonObject(channel) && channel.name === channelName && typeof channel.id === 'string') {
        log.debug({ channelName, channelId: channel.id, pages }, 'Resolved channel id');
        return channel.id;
      }
    }

    const metadata = data.response_metadata;
    const next = isJsonObject(metadata) ? metadata.next_cursor : undefined;
    cursor = typeof next === 'string' && next !== '' ? next : undefined;
  } while (cursor);

  throw new SlackDataError(`Channel named '${channelName}' not found.`);
}
