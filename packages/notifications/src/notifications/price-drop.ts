/**
 * Price Drop Notification
 *
 * Sent to a traveler when a tracked route gets cheaper.
 */

import {
  emailButton,
  escapeHtml,
  formatMoney,
  wrapEmailTemplate,
  type EmailChannel,
  type EmailResult,
} from '../channels/email';

export interface PriceDropInfo {
  origin: string;
  destination: string;
  departureDate: string;
  returnDate: string | null;
  latestPrice: number;
  /** The price the drop is measured against */
  previousPrice: number;
  currency: string;
  link: string | null;
}

export interface PriceDropEmail {
  subject: string;
  html: string;
  text: string;
}

export const PRICE_DROP_SUBJECT = 'Cheaper flight found for your tracked route';

export function buildPriceDropEmail(info: PriceDropInfo, appUrl: string): PriceDropEmail {
  const route = `${info.origin} → ${info.destination}`;
  const dates = info.returnDate ? `${info.departureDate} – ${info.returnDate}` : info.departureDate;
  const latest = formatMoney(info.latestPrice, info.currency);
  const previous = formatMoney(info.previousPrice, info.currency);
  const savings = formatMoney(info.previousPrice - info.latestPrice, info.currency);

  const html = wrapEmailTemplate(`
      <h1 style="margin: 0 0 16px 0; font-size: 22px;">Good news!</h1>
      <p style="margin: 0 0 16px 0;">We found a cheaper flight for your tracked route <strong>${escapeHtml(route)}</strong> on ${escapeHtml(dates)}.</p>
      <table style="width: 100%; border-collapse: collapse; margin: 16px 0;">
        <tr>
          <td style="padding: 8px 0; color: #666; width: 140px;">Latest price:</td>
          <td style="padding: 8px 0; font-weight: 700; color: #059669;">${latest}</td>
        </tr>
        <tr>
          <td style="padding: 8px 0; color: #666;">Previous best:</td>
          <td style="padding: 8px 0;">${previous}</td>
        </tr>
        <tr>
          <td style="padding: 8px 0; color: #666;">You save:</td>
          <td style="padding: 8px 0;">${savings}</td>
        </tr>
      </table>
      ${info.link ? emailButton('Book this flight', info.link) : ''}
      <p style="margin: 16px 0 0 0; color: #666; font-size: 13px;">Prices can change at any time, so if this works for you, consider booking soon.</p>
      <p style="margin: 8px 0 0 0; color: #666; font-size: 13px;"><a href="${escapeHtml(appUrl)}/dashboard">Manage your tracked routes</a></p>
  `);

  const text = [
    'Good news!',
    `We found a cheaper flight for your tracked route ${route} on ${dates}.`,
    `Latest price: ${latest}`,
    `Previous best: ${previous}`,
    info.link ? `Book: ${info.link}` : null,
    `Manage your tracked routes: ${appUrl}/dashboard`,
  ]
    .filter((line): line is string => line !== null)
    .join('\n');

  return { subject: PRICE_DROP_SUBJECT, html, text };
}

export async function sendPriceDropEmail(
  channel: EmailChannel,
  to: string,
  info: PriceDropInfo
): Promise<EmailResult> {
  const email = buildPriceDropEmail(info, channel.config.appUrl);
  return channel.send({ to, ...email });
}
