import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { createChildLogger } from '../config/logger.js';
import { resolveChannelId } from './channels.js';
import { bearerHeaders } from './credentials.js';
import { SLACK_ENDPOINTS } from './endpoints.js';
import {
  SlackApiError,
  SlackDataError,
  SlackProtocolError,
  SlackTransportError,
  SlackUploadError,
  errorMessage,
} from './errors.js';
import { apiErrorOf, describeStatus, readJson, slackFetch, type SlackRequestOptions } from './http.js';
import type { JsonObject } from './json.js';

const log = createChildLogger('slack-upload');

export interface FileUpload {
  /** Local path of the file to send. */
  path: string;
  /** Name shown in Slack. Defaults to the basename of `path`. */
  filename?: string;
  altText?: string;
  snippetType?: string;
  initialComment?: string;
  /** Parent message to thread the file under. */
  threadTs?: string;
  title?: string;
}

/** State shared by the three upload steps of one invocation. */
interface UploadSession {
  uploadUrl: string;
  fileId: string;
  channelId?: string;
}

async function fileSize(path: string): Promise<number> {
  try {
    const info = await stat(path);
    return info.size;
  } catch (err) {
    throw new SlackDataError(`File not found: ${path}`, err);
  }
}

async function requestUploadUrl(
  token: string,
  upload: FileUpload,
  length: number,
  options: SlackRequestOptions,
): Promise<UploadSession> {
  const query = new URLSearchParams({
    filename: upload.filename ?? basename(upload.path),
    length: String(length),
  });
  if (upload.altText) {
    query.set('alt_text', upload.altText);
  }
  if (upload.snippetType) {
    query.set('snippet_type', upload.snippetType);
  }

  const response = await slackFetch(
    `${SLACK_ENDPOINTS.getUploadUrlExternal}?${query.toString()}`,
    {
      method: 'GET',
      headers: {
        ...bearerHeaders(token),
        'Content-Type': 'application/x-www-form-urlencoded',
      },
    },
    'files.getUploadURLExternal',
    options,
  );

  if (response.status !== 200) {
    throw new SlackTransportError(`Error retrieving upload URL: ${describeStatus(response)}`, response.status);
  }

  const data = await readJson(response);
  if (data.ok !== true) {
    const apiError = apiErrorOf(data);
    throw new SlackApiError(`Failed to retrieve upload URL: ${apiError ?? 'Unknown error'}`, apiError);
  }

  const { upload_url: uploadUrl, file_id: fileId } = data;
  if (typeof uploadUrl !== 'string' || typeof fileId !== 'string') {
    throw new SlackProtocolError('files.getUploadURLExternal response is missing upload_url or file_id');
  }
  return { uploadUrl, fileId };
}

async function sendFileBytes(
  session: UploadSession,
  path: string,
  options: SlackRequestOptions,
): Promise<void> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (err) {
    throw new SlackDataError(`The file ${path} is not found.`, err);
  }

  const response = await slackFetch(
    session.uploadUrl,
    {
      method: 'POST',
      headers: { 'Content-Type': 'application/octet-stream' },
      body: content,
    },
    'file upload URL',
    options,
  );

  if (response.status !== 200) {
    throw new SlackTransportError(`Error during file upload: ${describeStatus(response)}`, response.status);
  }
}

async function completeUpload(
  token: string,
  session: UploadSession,
  upload: FileUpload,
  options: SlackRequestOptions,
): Promise<JsonObject> {
  const file: JsonObject = { id: session.fileId };
  if (upload.title) {
    file.title = upload.title;
  }

  const body: JsonObject = { files: [file] };
  if (session.channelId !== undefined) {
    body.channel_id = session.channelId;
  }
  if (upload.initialComment) {
    body.initial_comment = upload.initialComment;
  }
  if (upload.threadTs) {
    body.thread_ts = upload.threadTs;
  }

  const response = await slackFetch(
    SLACK_ENDPOINTS.completeUploadExternal,
    {
      method: 'POST',
      headers: {
        ...bearerHeaders(token),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    },
    'files.completeUploadExternal',
    options,
  );

  if (response.status !== 200) {
    throw new SlackTransportError(`Error during upload completion: ${describeStatus(response)}`, response.status);
  }

  const data = await readJson(response);
  if (data.ok !== true) {
    throw new SlackApiError(`Failed to complete the upload: ${JSON.stringify(data)}`, apiErrorOf(data));
  }
  return data;
}

/**
 * Upload a local file and share it in `channel`:
 *
 * 1. ask files.getUploadURLExternal for an upload URL and file id
 * 2. POST the raw bytes to that URL
 * 3. resolve the channel name to an id and call files.completeUploadExternal
 *
 * Slack offers no way to undo a half-finished upload, so a failure at any step
 * is reported as is. Every failure surfaces as a SlackUploadError.
 */
export async function uploadFileToSlack(
  token: string,
  channel: string,
  upload: FileUpload,
  options: SlackRequestOptions = {},
): Promise<JsonObject> {
  try {
    const length = await fileSize(upload.path);
    const session = await requestUploadUrl(token, upload, length, options);
    log.debug({ fileId: session.fileId, length }, 'Upload URL issued');

    await sendFileBytes(session, upload.path, options);

    session.channelId = await resolveChannelId(token, channel, options);
    const result = await completeUpload(token, session, upload, options);

    log.info({ fileId: session.fileId, channelId: session.channelId }, 'File uploaded to Slack');
    return result;
  } catch (err) {
    log.warn({ err, path: upload.path }, 'File upload failed');
    throw new SlackUploadError(`Error uploading file: ${errorMessage(err)}`, err);
  }
}
