/**
 * Slack Channel - Webhook Integration
 *
 * Sends operational messages to Slack via Incoming Webhooks.
 * The webhook URL comes from SLACK_OPS_WEBHOOK_URL; when it is unset, messages
 * are skipped and reported as successful.
 */

import { createLogger } from '@farewatch/logger';

const log = createLogger('notifications').child('slack');

// =============================================================================
// Types
// =============================================================================

export interface SlackResult {
  success: boolean;
  skipped?: boolean;
  error?: string;
}

export interface SlackTextBlock {
  type: 'section';
  text: {
    type: 'mrkdwn' | 'plain_text';
    text: string;
  };
}

export interface SlackHeaderBlock {
  type: 'header';
  text: {
    type: 'plain_text';
    text: string;
    emoji?: boolean;
  };
}

export interface SlackDividerBlock {
  type: 'divider';
}

export interface SlackContextBlock {
  type: 'context';
  elements: Array<{
    type: 'mrkdwn' | 'plain_text';
    text: string;
  }>;
}

export type SlackBlock = SlackTextBlock | SlackHeaderBlock | SlackDividerBlock | SlackContextBlock;

export interface SlackMessage {
  text: string; // Fallback text for notifications
  blocks?: SlackBlock[];
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

// =============================================================================
// Core Slack Function
// =============================================================================

export async function sendSlackMessage(
  message: SlackMessage,
  webhookUrl: string | undefined,
  fetchImpl: FetchLike = fetch
): Promise<SlackResult> {
  if (!webhookUrl) {
    log.debug('Webhook URL not configured, skipping notification');
    return { success: true, skipped: true };
  }

  try {
    const response = await fetchImpl(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
    });

    if (!response.ok) {
      const text = await response.text();
      log.warn('Failed to send message', { status: response.status, body: text });
      return { success: false, error: text || `HTTP ${response.status}` };
    }

    log.debug('Message sent');
    return { success: true };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log.warn('Error sending message', { errorMessage: message });
    return { success: false, error: message };
  }
}

// =============================================================================
// Slack Block Helpers
// =============================================================================

export function slackHeader(text: string): SlackHeaderBlock {
  return {
    type: 'header',
    text: { type: 'plain_text', text, emoji: true },
  };
}

export function slackText(text: string): SlackTextBlock {
  return {
    type: 'section',
    text: { type: 'mrkdwn', text },
  };
}

export function slackDivider(): SlackDividerBlock {
  return { type: 'divider' };
}

export function slackContext(...texts: string[]): SlackContextBlock {
  return {
    type: 'context',
    elements: texts.map(text => ({ type: 'mrkdwn', text })),
  };
}

export function slackFieldsSection(fields: Record<string, string>): SlackTextBlock {
  const text = Object.entries(fields)
    .map(([label, value]) => `*${label}:* ${value}`)
    .join('\n');

  return slackText(text);
}
