export { runSlackTask, hasMessageChanged } from './task.js';
export type { SlackTaskResult, SlackTaskSuccess, SlackTaskFailure, SlackTaskOptions } from './task.js';
export { slackTaskSchema, fileUploadSchema } from './schema.js';
export type { SlackTaskInput, SlackTaskParams } from './schema.js';
export { buildPayload, applyChannelPrefix, isValidColor, isValidHexColor, NAMED_COLORS } from './payload.js';
export type { PayloadInput, SlackPayload, PrependHash, ParseMode, LinkNames } from './payload.js';
export { classifyToken, resolveTarget, obscureTarget } from './credentials.js';
export type { SlackCredential, SlackCredentialKind, SlackTarget } from './credentials.js';
export { escapeQuotes, escapeTree } from './escape.js';
export { notifySlack } from './notify.js';
export { getSlackMessage } from './history.js';
export { resolveChannelId } from './channels.js';
export { uploadFileToSlack } from './upload.js';
export type { FileUpload } from './upload.js';
export * from './errors.js';
export type { JsonValue, JsonObject } from './json.js';
