import { isDeepStrictEqual } from 'node:util';
import { createChildLogger } from '../config/logger.js';
import { SlackApiError, SlackConfigError, SlackTaskError, type SlackErrorCode } from './errors.js';
import { getSlackMessage } from './history.js';
import type { JsonObject, JsonValue } from './json.js';
import { notifySlack } from './notify.js';
import { NAMED_COLORS, buildPayload, isValidColor, type PrependHash } from './payload.js';
import type { SlackTaskParams } from './schema.js';
import { uploadFileToSlack } from './upload.js';

const log = createChildLogger('slack-task');

// ─── Result Types ───────────────────────────────────────────────────

interface ResultBase {
  /** Deprecation notices raised while running the task. */
  warnings: string[];
}

export type SlackTaskSuccess = ResultBase & { ok: true } & (
  | {
      kind: 'message';
      changed: boolean;
      ts: string | undefined;
      channel: string | undefined;
      api: JsonObject;
      /** The payload as sent, serialized. */
      payload: string;
    }
  | { kind: 'webhook'; changed: boolean; msg: 'OK' }
  | { kind: 'unchanged'; changed: false; ts: string | undefined; channel: string | undefined }
  | { kind: 'dry-run'; changed: boolean; ts?: string; channel?: string; msg?: string }
  | { kind: 'upload'; changed: true; msg: string; uploadResponse: JsonObject }
);

export interface SlackTaskFailure extends ResultBase {
  ok: false;
  msg: string;
  code?: SlackErrorCode;
  /** The WebAPI `error` string, when Slack sent one. */
  error?: string;
}

export type SlackTaskResult = SlackTaskSuccess | SlackTaskFailure;

export interface SlackTaskOptions {
  /** Compute the outcome but never write to Slack. */
  dryRun?: boolean;
}

// ─── Edit diff ──────────────────────────────────────────────────────

/**
 * Compare the fields of an existing message that a task can change. Text is
 * not among them: an edit that only rewrites text is reported as unchanged.
 */
export function hasMessageChanged(message: JsonObject, params: SlackTaskParams): boolean {
  const requested: Record<string, JsonValue | undefined> = {
    icon_url: params.iconUrl,
    icon_emoji: params.iconEmoji,
    link_names: params.linkNames,
    color: params.color,
    attachments: params.attachments,
    blocks: params.blocks,
  };
  return Object.entries(requested).some(([key, value]) => !isDeepStrictEqual(message[key], value));
}

function stringField(obj: JsonObject, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

// ─── Entry point ────────────────────────────────────────────────────

const PREPEND_HASH_DEPRECATION =
  "The default value 'auto' for 'prependHash' is deprecated and will change to 'never'. "
  + "Set 'prependHash' explicitly to avoid this warning.";

function resolvePrependHash(params: SlackTaskParams, warnings: string[]): PrependHash {
  if (params.prependHash !== undefined) {
    return params.prependHash;
  }
  warnings.push(PREPEND_HASH_DEPRECATION);
  log.warn({ channel: params.channel }, PREPEND_HASH_DEPRECATION);
  return 'auto';
}

function requireChannel(params: SlackTaskParams, purpose: string): string {
  if (!params.channel) {
    throw new SlackConfigError(`channel is required to ${purpose}`);
  }
  return params.channel;
}

async function runUpload(
  params: SlackTaskParams,
  upload: NonNullable<SlackTaskParams['uploadFile']>,
  options: SlackTaskOptions,
  warnings: string[],
): Promise<SlackTaskResult> {
  const channel = requireChannel(params, 'upload a file');
  if (options.dryRun) {
    return { ok: true, kind: 'dry-run', changed: true, msg: 'File would be uploaded', warnings };
  }

  const uploadResponse = await uploadFileToSlack(params.token, channel, upload, {
    validateCerts: params.validateCerts,
  });
  return { ok: true, kind: 'upload', changed: true, msg: 'File uploaded successfully', uploadResponse, warnings };
}

async function runMessage(
  params: SlackTaskParams,
  options: SlackTaskOptions,
  warnings: string[],
): Promise<SlackTaskResult> {
  const prependHash = resolvePrependHash(params, warnings);

  if (!isValidColor(params.color)) {
    throw new SlackConfigError(
      `Color value specified should be either one of ${NAMED_COLORS.join(', ')} `
      + 'or any valid hex value with length 3 or 6.',
    );
  }

  const requestOptions = { validateCerts: params.validateCerts };
  let changed = true;

  if (params.messageId !== undefined) {
    const channel = requireChannel(params, 'edit a message');
    const existing = await getSlackMessage(params.token, channel, params.messageId, requestOptions);
    const ts = stringField(existing, 'ts');
    const existingChannel = stringField(existing, 'channel') ?? channel;

    changed = hasMessageChanged(existing, params);
    if (!changed) {
      log.info({ channel: existingChannel, ts }, 'Slack message already up to date');
      return { ok: true, kind: 'unchanged', changed: false, ts, channel: existingChannel, warnings };
    }
    if (options.dryRun) {
      return { ok: true, kind: 'dry-run', changed, ts, channel: existingChannel, warnings };
    }
  } else if (options.dryRun) {
    return { ok: true, kind: 'dry-run', changed, warnings };
  }

  const payload = buildPayload({
    text: params.msg,
    channel: params.channel,
    threadId: params.threadId,
    username: params.username,
    iconUrl: params.iconUrl,
    iconEmoji: params.iconEmoji,
    linkNames: params.linkNames,
    parse: params.parse,
    color: params.color,
    attachments: params.attachments,
    blocks: params.blocks,
    messageId: params.messageId,
    prependHash,
  });

  const response = await notifySlack(params.token, params.domain, payload, requestOptions);

  if (!('ok' in response)) {
    // Webhooks answer 200 and nothing more.
    log.info({ channel: payload.channel }, 'Slack webhook delivered');
    return { ok: true, kind: 'webhook', changed, msg: 'OK', warnings };
  }

  if (response.ok !== true) {
    const apiError = stringField(response, 'error');
    throw new SlackApiError('Slack API error', apiError);
  }

  const result = {
    ts: stringField(response, 'ts'),
    channel: stringField(response, 'channel'),
  };
  log.info(result, payload.ts !== undefined ? 'Slack message updated' : 'Slack message posted');
  return {
    ok: true,
    kind: 'message',
    changed,
    ...result,
    api: response,
    payload: JSON.stringify(payload),
    warnings,
  };
}

/**
 * Run one task: upload a file, or post or edit a message.
 *
 * A file upload takes precedence over everything else in the record. Every
 * failure the task can anticipate comes back as `{ ok: false }`; anything
 * else is a bug and is rethrown.
 */
export async function runSlackTask(
  params: SlackTaskParams,
  options: SlackTaskOptions = {},
): Promise<SlackTaskResult> {
  const warnings: string[] = [];
  try {
    if (params.uploadFile) {
      return await runUpload(params, params.uploadFile, options, warnings);
    }
    return await runMessage(params, options, warnings);
  } catch (err) {
    if (err instanceof SlackTaskError) {
      log.warn({ code: err.code, msg: err.message }, 'Slack task failed');
      return {
        ok: false,
        msg: err.message,
        code: err.code,
        ...(err instanceof SlackApiError && err.apiError !== undefined ? { error: err.apiError } : {}),
        warnings,
      };
    }
    throw err;
  }
}
