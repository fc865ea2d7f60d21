import { describe, it, expect, vi } from 'vitest';
import { EmailChannel, escapeHtml, formatMoney } from '../channels/email';
import { buildPriceDropEmail, sendPriceDropEmail, PRICE_DROP_SUBJECT } from '../notifications/price-drop';

vi.mock('@farewatch/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() };
  return { createLogger: () => ({ child: () => log }) };
});

const config = { fromAddress: 'alerts@example.test', appUrl: 'https://app.example.test' };

const dropInfo = {
  origin: 'JFK',
  destination: 'LAX',
  departureDate: '2026-12-20',
  returnDate: null,
  latestPrice: 275,
  previousPrice: 300,
  currency: 'USD',
  link: 'https://flights.example.test/offer?a=1&b=2',
};

describe('EmailChannel', () => {
  it('sends through the transport and returns the message id', async () => {
    const send = vi.fn().mockResolvedValue({ data: { id: 'email-1' }, error: null });
    const channel = new EmailChannel({ send }, config);

    const result = await channel.send({ to: 'traveler@example.test', subject: 'Hi', html: '<p>Hi</p>' });

    expect(result).toEqual({ success: true, messageId: 'email-1' });
    expect(send).toHaveBeenCalledWith({
      from: 'FareWatch Alerts <alerts@example.test>',
      to: ['traveler@example.test'],
      subject: 'Hi',
      html: '<p>Hi</p>',
      text: undefined,
    });
  });

  it('reports an API error as a failed send', async () => {
    const send = vi.fn().mockResolvedValue({
      data: null,
      error: { name: 'validation_error', message: 'Invalid `to` field' },
    });
    const channel = new EmailChannel({ send }, config);

    const result = await channel.send({ to: 'bad', subject: 'Hi', html: '' });

    expect(result).toEqual({ success: false, error: 'Invalid `to` field' });
  });

  it('reports a thrown transport error as a failed send', async () => {
    const send = vi.fn().mockRejectedValue(new Error('socket hang up'));
    const channel = new EmailChannel({ send }, config);

    expect(await channel.send({ to: 'a@example.test', subject: 'Hi', html: '' })).toEqual({
      success: false,
      error: 'socket hang up',
    });
  });

  it('skips sending when no transport is configured', async () => {
    const channel = new EmailChannel(null, config);

    expect(channel.enabled).toBe(false);
    expect(await channel.send({ to: 'a@example.test', subject: 'Hi', html: '' })).toEqual({
      success: false,
      skipped: true,
      error: 'Email delivery not configured',
    });
  });
});

describe('buildPriceDropEmail', () => {
  it('describes the drop in the text body', () => {
    const email = buildPriceDropEmail(dropInfo, 'https://app.example.test');

    expect(email.subject).toBe(PRICE_DROP_SUBJECT);
    expect(email.text).toBe(
      [
        'Good news!',
        'We found a cheaper flight for your tracked route JFK → LAX on 2026-12-20.',
        'Latest price: $275.00',
        'Previous best: $300.00',
        'Book: https://flights.example.test/offer?a=1&b=2',
        'Manage your tracked routes: https://app.example.test/dashboard',
      ].join('\n')
    );
  });

  it('escapes the booking link and shows savings in the html body', () => {
    const email = buildPriceDropEmail(dropInfo, 'https://app.example.test');

    expect(email.html).toContain('href="https://flights.example.test/offer?a=1&amp;b=2"');
    expect(email.html).toContain('<td style="padding: 8px 0;">$25.00</td>');
  });

  it('shows both dates and omits the button for a round trip without a link', () => {
    const email = buildPriceDropEmail(
      { ...dropInfo, returnDate: '2027-01-04', link: null },
      'https://app.example.test'
    );

    expect(email.text).toContain('JFK → LAX on 2026-12-20 – 2027-01-04.');
    expect(email.html).not.toContain('Book this flight');
  });
});

describe('sendPriceDropEmail', () => {
  it('sends the built email to the traveler', async () => {
    const send = vi.fn().mockResolvedValue({ data: { id: 'email-2' }, error: null });
    const channel = new EmailChannel({ send }, config);

    const result = await sendPriceDropEmail(channel, 'traveler@example.test', dropInfo);

    expect(result.success).toBe(true);
    expect(send.mock.calls[0][0].subject).toBe(PRICE_DROP_SUBJECT);
    expect(send.mock.calls[0][0].to).toEqual(['traveler@example.test']);
  });
});

describe('helpers', () => {
  it('escapes html metacharacters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });

  it('formats known and unknown currencies', () => {
    expect(formatMoney(1234.5, 'USD')).toBe('$1,234.50');
    expect(formatMoney(99, 'NOT-A-CODE')).toBe('99.00 NOT-A-CODE');
  });
});
