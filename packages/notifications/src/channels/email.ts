/**
 * Email Channel - Resend Integration
 *
 * Without an API key the channel stays disabled: sends are skipped and
 * reported as unsuccessful so callers never record a notification that was
 * not delivered.
 */

import { Resend } from 'resend';
import { createLogger } from '@farewatch/logger';

const log = createLogger('notifications').child('email');

// =============================================================================
// Types
// =============================================================================

export interface EmailConfig {
  apiKey?: string;
  /** Bare address, e.g. alerts@farewatch.app */
  fromAddress: string;
  fromName?: string;
  appUrl: string;
}

export interface EmailResult {
  success: boolean;
  skipped?: boolean;
  messageId?: string;
  error?: string;
}

export interface SendEmailOptions {
  to: string;
  subject: string;
  html: string;
  text?: string;
}

export type EmailTransport = Pick<Resend['emails'], 'send'>;

// =============================================================================
// Channel
// =============================================================================

export class EmailChannel {
  constructor(
    private readonly transport: EmailTransport | null,
    readonly config: EmailConfig
  ) {}

  get enabled(): boolean {
    return this.transport !== null;
  }

  async send(options: SendEmailOptions): Promise<EmailResult> {
    if (!this.transport) {
      log.warn('RESEND_API_KEY not configured, skipping email', { subject: options.subject });
      return { success: false, skipped: true, error: 'Email delivery not configured' };
    }

    const fromName = this.config.fromName ?? 'FareWatch Alerts';

    try {
      const { data, error } = await this.transport.send({
        from: `${fromName} <${this.config.fromAddress}>`,
        to: [options.to],
        subject: options.subject,
        html: options.html,
        text: options.text,
      });

      if (error) {
        log.warn('Resend rejected email', { subject: options.subject, errorMessage: error.message });
        return { success: false, error: error.message };
      }

      return { success: true, messageId: data?.id };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.warn('Failed to send email', { subject: options.subject, errorMessage: message });
      return { success: false, error: message };
    }
  }
}

export function createEmailChannel(config: EmailConfig): EmailChannel {
  const transport = config.apiKey ? new Resend(config.apiKey).emails : null;
  return new EmailChannel(transport, config);
}

// =============================================================================
// Template Helpers
// =============================================================================

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export function wrapEmailTemplate(content: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
  </head>
  <body style="margin: 0; padding: 24px; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; background-color: #f5f5f5; color: #1a1a1a;">
    <div style="max-width: 600px; margin: 0 auto; background: #ffffff; border-radius: 8px; padding: 32px;">
      ${content}
    </div>
  </body>
</html>`;
}

export function emailButton(text: string, url: string): string {
  return `<p style="margin: 24px 0;"><a href="${escapeHtml(url)}" style="display: inline-block; padding: 12px 24px; background: #2563eb; color: #ffffff; text-decoration: none; border-radius: 6px; font-weight: 600;">${escapeHtml(text)}</a></p>`;
}

/**
 * Currency amount for display. Unknown currency codes fall back to `123.45 XYZ`.
 */
export function formatMoney(amount: number, currency: string): string {
  try {
    return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(amount);
  } catch {
    return `${amount.toFixed(2)} ${currency}`;
  }
}
