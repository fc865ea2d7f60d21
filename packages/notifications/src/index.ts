/**
 * @farewatch/notifications
 *
 * Email (Resend) and Slack (webhook) delivery for FareWatch.
 *
 * Usage:
 * ```typescript
 * const email = createEmailChannel({ apiKey, fromAddress, appUrl });
 * await sendPriceDropEmail(email, user.email, { ... });
 * await notifyRefreshRunCompleted(summary, process.env.SLACK_OPS_WEBHOOK_URL);
 * ```
 */

// =============================================================================
// Channel Exports
// =============================================================================

export {
  EmailChannel,
  createEmailChannel,
  escapeHtml,
  formatMoney,
  wrapEmailTemplate,
  emailButton,
  type EmailConfig,
  type EmailResult,
  type EmailTransport,
  type SendEmailOptions,
} from './channels/email';

export {
  sendSlackMessage,
  slackHeader,
  slackText,
  slackDivider,
  slackContext,
  slackFieldsSection,
  type FetchLike,
  type SlackResult,
  type SlackMessage,
  type SlackBlock,
} from './channels/slack';

// =============================================================================
// Notification Exports
// =============================================================================

export {
  PRICE_DROP_SUBJECT,
  buildPriceDropEmail,
  sendPriceDropEmail,
  type PriceDropEmail,
  type PriceDropInfo,
} from './notifications/price-drop';

export {
  MAX_LISTED_FAILURES,
  buildRunSummaryMessage,
  notifyRefreshRunCompleted,
  type RunSummaryInfo,
} from './notifications/run-summary';
