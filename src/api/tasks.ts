import { Hono } from 'hono';
import { realpath } from 'node:fs/promises';
import { isAbsolute, relative, resolve, sep } from 'node:path';
import { getEnv } from '../config/env.js';
import { createChildLogger } from '../config/logger.js';
import { slackTaskSchema } from '../slack/schema.js';
import { runSlackTask, type SlackTaskResult } from '../slack/task.js';

const log = createChildLogger('tasks-api');

/**
 * HTTP status for a task outcome. Bad input is the caller's problem (400);
 * anything Slack refused or failed on is a bad gateway (502).
 */
function statusFor(result: SlackTaskResult): 200 | 400 | 502 {
  if (result.ok) return 200;
  return result.code === 'CONFIG_ERROR' ? 400 : 502;
}

/**
 * Resolve an upload path against `root`, following symlinks. Returns null
 * when the file would lie outside `root`.
 */
export async function resolveUploadPath(root: string, requested: string): Promise<string | null> {
  const base = await realpath(root).catch(() => resolve(root));
  const lexical = resolve(base, requested);
  // A missing file keeps its lexical path; the uploader reports it.
  const target = await realpath(lexical).catch(() => lexical);
  const rel = relative(base, target);
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return null;
  }
  return target;
}

export function createTaskRoutes() {
  const app = new Hono();

  // ─── Run a Slack task ──────────────────────────────────────────

  app.post('/slack', async (c) => {
    const env = getEnv();
    const body: unknown = await c.req.json().catch(() => null);
    if (body === null || typeof body !== 'object' || Array.isArray(body)) {
      return c.json({ error: 'Request body must be a JSON object' }, 400);
    }

    // The server-wide credential fills in for tasks that bring none.
    const parsed = slackTaskSchema.safeParse({
      token: env.SLACK_TOKEN,
      domain: env.SLACK_DOMAIN,
      ...body,
    });
    if (!parsed.success) {
      return c.json({
        error: 'Invalid task',
        details: parsed.error.flatten().fieldErrors,
      }, 400);
    }

    let task = parsed.data;
    if (task.uploadFile) {
      if (!env.UPLOAD_DIR) {
        return c.json({ error: 'File uploads are disabled: UPLOAD_DIR is not set' }, 403);
      }
      const path = await resolveUploadPath(env.UPLOAD_DIR, task.uploadFile.path);
      if (!path) {
        log.warn({ path: task.uploadFile.path }, 'Upload path outside UPLOAD_DIR refused');
        return c.json({ error: 'uploadFile.path must point inside UPLOAD_DIR' }, 403);
      }
      task = { ...task, uploadFile: { ...task.uploadFile, path } };
    }

    const dryRun = c.req.query('dryRun') === 'true';
    const result = await runSlackTask(task, { dryRun });

    if (!result.ok) {
      log.warn({ code: result.code, msg: result.msg }, 'Slack task failed');
    }
    return c.json(result, statusFor(result));
  });

  return app;
}
