// ─── Slack endpoint templates ───────────────────────────────────────

export const SLACK_ENDPOINTS = Object.freeze({
  incomingWebhook: 'https://hooks.slack.com/services/',
  postMessage: 'https://slack.com/api/chat.postMessage',
  updateMessage: 'https://slack.com/api/chat.update',
  conversationsHistory: 'https://slack.com/api/conversations.history',
  conversationsList: 'https://slack.com/api/conversations.list',
  getUploadUrlExternal: 'https://slack.com/api/files.getUploadURLExternal',
  completeUploadExternal: 'https://slack.com/api/files.completeUploadExternal',
} as const);

/** Shown in place of a webhook URL in error text. */
export const OBSCURED_WEBHOOK_URL = `${SLACK_ENDPOINTS.incomingWebhook}[obscured]`;

export function incomingWebhookUrl(token: string): string {
  return `${SLACK_ENDPOINTS.incomingWebhook}${token}`;
}

export function legacyWebhookUrl(domain: string, token: string): string {
  return `https://${domain}/services/hooks/incoming-webhook?token=${token}`;
}
