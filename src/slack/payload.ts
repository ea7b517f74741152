import { escapeObject, escapeQuotes } from './escape.js';
import type { JsonObject } from './json.js';

// ─── Types ──────────────────────────────────────────────────────────

export type PrependHash = 'always' | 'never' | 'auto';
export type ParseMode = 'full' | 'none';
export type LinkNames = 0 | 1;

export const NAMED_COLORS = ['normal', 'good', 'warning', 'danger'] as const;

export interface PayloadInput {
  text?: string;
  channel?: string;
  threadId?: string;
  username?: string;
  iconUrl?: string;
  iconEmoji?: string;
  linkNames?: LinkNames;
  parse?: ParseMode;
  color?: string;
  attachments?: JsonObject[];
  blocks?: JsonObject[];
  /** Timestamp of the message to edit. */
  messageId?: string;
  prependHash?: PrependHash;
}

/** Body of chat.postMessage / chat.update / an incoming webhook. */
export interface SlackPayload {
  text?: string;
  channel?: string;
  thread_ts?: string;
  username?: string;
  icon_emoji?: string;
  icon_url?: string;
  link_names?: LinkNames;
  parse?: ParseMode;
  ts?: string;
  attachments?: JsonObject[];
  blocks?: JsonObject[];
}

// ─── Validation ─────────────────────────────────────────────────────

const HEX_COLOR_PATTERN = /^#([A-Fa-f0-9]{6}|[A-Fa-f0-9]{3})$/;

export function isValidHexColor(color: string): boolean {
  return HEX_COLOR_PATTERN.test(color);
}

export function isValidColor(color: string): boolean {
  return NAMED_COLORS.some((named) => named === color) || isValidHexColor(color);
}

// ─── Builders ───────────────────────────────────────────────────────

/** Channel ids and names Slack accepts without a leading `#`. */
const UNPREFIXED_CHANNEL_STARTS = ['#', '@', 'C0', 'GF', 'G0', 'CP'];

export function applyChannelPrefix(channel: string, policy: PrependHash = 'auto'): string {
  switch (policy) {
    case 'always':
      return `#${channel}`;
    case 'never':
      return channel;
    case 'auto':
      return UNPREFIXED_CHANNEL_STARTS.some((prefix) => channel.startsWith(prefix))
        ? channel
        : `#${channel}`;
  }
}

const ATTACHMENT_ESCAPED_KEYS = ['title', 'text', 'author_name', 'pretext', 'fallback'];
const BLOCK_ESCAPED_KEYS = ['text', 'alt_text'];

function escapeAttachment(attachment: JsonObject): JsonObject {
  const escaped: JsonObject = { ...attachment };
  for (const key of ATTACHMENT_ESCAPED_KEYS) {
    const value = escaped[key];
    if (typeof value === 'string') {
      escaped[key] = escapeQuotes(value);
    }
  }
  if (!('fallback' in escaped) && 'text' in escaped) {
    escaped.fallback = escaped.text;
  }
  return escaped;
}

/**
 * Assemble the JSON body for one message. Fields the caller left unset are
 * omitted, never sent as null.
 *
 * Text with a color other than `normal` goes into a synthetic attachment;
 * that is the only way to put a color bar in front of plain text.
 */
export function buildPayload(input: PayloadInput): SlackPayload {
  const payload: SlackPayload = {};
  const color = input.color ?? 'normal';

  if (input.text !== undefined) {
    if (color === 'normal') {
      payload.text = escapeQuotes(input.text);
    } else {
      payload.attachments = [{ text: escapeQuotes(input.text), color, mrkdwn_in: ['text'] }];
    }
  }
  if (input.channel !== undefined) {
    payload.channel = applyChannelPrefix(input.channel, input.prependHash);
  }
  if (input.threadId !== undefined) {
    payload.thread_ts = input.threadId;
  }
  if (input.username !== undefined) {
    payload.username = input.username;
  }
  if (input.iconEmoji !== undefined) {
    payload.icon_emoji = input.iconEmoji;
  } else if (input.iconUrl !== undefined) {
    payload.icon_url = input.iconUrl;
  }
  if (input.linkNames !== undefined) {
    payload.link_names = input.linkNames;
  }
  if (input.parse !== undefined) {
    payload.parse = input.parse;
  }
  if (input.messageId !== undefined) {
    payload.ts = input.messageId;
  }
  if (input.attachments !== undefined) {
    payload.attachments = [
      ...(payload.attachments ?? []),
      ...input.attachments.map(escapeAttachment),
    ];
  }
  if (input.blocks !== undefined) {
    payload.blocks = input.blocks.map((block) => escapeObject(block, BLOCK_ESCAPED_KEYS));
  }

  return payload;
}
