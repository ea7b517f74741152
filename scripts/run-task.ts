/**
 * Run a single Slack task from a JSON file and print the result.
 *
 * Run: npx tsx scripts/run-task.ts <task.json> [--dry-run]
 *
 * `token` and `domain` fall back to SLACK_TOKEN and SLACK_DOMAIN. Exits 1 when
 * the task fails or the file does not hold a valid task.
 */

import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { slackTaskSchema } from '../src/slack/schema.js';
import { runSlackTask } from '../src/slack/task.js';

async function main() {
  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const taskPath = args.find((arg) => !arg.startsWith('--'));

  if (!taskPath) {
    console.error('Usage: run-task <task.json> [--dry-run]');
    process.exit(1);
  }

  const raw: unknown = JSON.parse(await readFile(taskPath, 'utf8'));
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    console.error(`${taskPath} must contain a JSON object`);
    process.exit(1);
  }

  const parsed = slackTaskSchema.safeParse({
    token: process.env.SLACK_TOKEN,
    domain: process.env.SLACK_DOMAIN,
    ...raw,
  });
  if (!parsed.success) {
    console.error('Invalid task:', parsed.error.flatten().fieldErrors);
    process.exit(1);
  }

  const result = await runSlackTask(parsed.data, { dryRun });
  console.log(JSON.stringify(result, null, 2));
  process.exit(result.ok ? 0 : 1);
}

main().catch((err) => {
  console.error('Task crashed:', err);
  process.exit(1);
});
