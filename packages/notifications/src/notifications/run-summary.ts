/**
 * Price Refresh Run Notification
 *
 * Posts the outcome of a refresh run to the ops Slack channel.
 */

import {
  sendSlackMessage,
  slackContext,
  slackDivider,
  slackFieldsSection,
  slackHeader,
  slackText,
  type FetchLike,
  type SlackBlock,
  type SlackMessage,
  type SlackResult,
} from '../channels/slack';

export interface RunSummaryInfo {
  runId: string;
  asOf: string;
  total: number;
  succeeded: number;
  failed: number;
  durationMs: number;
  failures: Array<{ subjectId: string; route: string; code: string; message: string }>;
  alertsSent?: number;
}

/** Failures listed individually; the rest are counted */
export const MAX_LISTED_FAILURES = 10;

export function buildRunSummaryMessage(info: RunSummaryInfo): SlackMessage {
  const ok = info.failed === 0;
  const title = ok ? '✅ Price refresh complete' : '⚠️ Price refresh finished with failures';

  const fields: Record<string, string> = {
    'Run date': info.asOf,
    Subjects: String(info.total),
    Succeeded: String(info.succeeded),
    Failed: String(info.failed),
    Duration: `${(info.durationMs / 1000).toFixed(1)}s`,
  };
  if (info.alertsSent !== undefined) {
    fields['Alerts sent'] = String(info.alertsSent);
  }

  const blocks: SlackBlock[] = [slackHeader(title), slackFieldsSection(fields)];

  if (info.failures.length > 0) {
    const listed = info.failures
      .slice(0, MAX_LISTED_FAILURES)
      .map((f) => `• \`${f.subjectId}\` ${f.route}: *${f.code}* ${f.message}`);
    const remaining = info.failures.length - MAX_LISTED_FAILURES;
    if (remaining > 0) {
      listed.push(`…and ${remaining} more`);
    }
    blocks.push(slackDivider(), slackText(listed.join('\n')));
  }

  blocks.push(slackContext(`Run \`${info.runId}\``));

  return {
    text: `${title}: ${info.succeeded}/${info.total} succeeded`,
    blocks,
  };
}

export async function notifyRefreshRunCompleted(
  info: RunSummaryInfo,
  webhookUrl: string | undefined,
  fetchImpl?: FetchLike
): Promise<SlackResult> {
  return sendSlackMessage(buildRunSummaryMessage(info), webhookUrl, fetchImpl);
}
