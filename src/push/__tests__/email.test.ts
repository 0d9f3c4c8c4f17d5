import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EmailDelivery, escapeHtml, renderEmail } from '../email.js';
import type { ClassifiedItem } from '../../scan/freshness.js';
import type { TrackedSource } from '../../source/adapter.js';
import { generateDefaultConfig } from '../../shared/config.js';
import { DeliveryError } from '../../shared/errors.js';

const { sendMail } = vi.hoisted(() => ({ sendMail: vi.fn() }));

vi.mock('nodemailer', () => ({
  default: { createTransport: vi.fn(() => ({ sendMail })) },
}));

const SOURCE: TrackedSource = { url: 'https://www.olx.pl/telefony/', hashtag: '#phones', title: null };

const ITEM: ClassifiedItem = {
  id: 'id:1',
  url: 'https://www.olx.pl/d/oferta/iphone.html',
  title: 'iPhone <13>',
  postedText: 'Dzisiaj o 12:30',
  price: '100 zł',
  postedAt: null,
  ageMs: 0,
  tier: 'very_fresh',
};

const emailConfig = {
  ...generateDefaultConfig().delivery.email,
  enabled: true,
  smtp_host: 'smtp.test',
  to: ['me@example.com', 'you@example.com'],
};

beforeEach(() => {
  sendMail.mockReset();
});

describe('escapeHtml', () => {
  it('escapes markup and quotes', () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#39;');
  });
});

describe('renderEmail', () => {
  it('builds subject and plain text from the present fields', () => {
    const { subject, text, html } = renderEmail(ITEM, SOURCE);

    expect(subject).toBe('#phones iPhone <13> · 100 zł');
    expect(text).toBe(
      [
        'iPhone <13>',
        'Price: 100 zł',
        'Posted: Dzisiaj o 12:30',
        '',
        'https://www.olx.pl/d/oferta/iphone.html',
        '',
        'Source: https://www.olx.pl/telefony/',
      ].join('\n'),
    );
  });

  it('renders an escaped HTML document through MJML', () => {
    const { html } = renderEmail(ITEM, SOURCE);

    expect(html.startsWith('<!doctype html>')).toBe(true);
    expect(html).toContain('href="https://www.olx.pl/d/oferta/iphone.html"');
    expect(html).toContain('>iPhone &lt;13&gt;</a>');
    expect(html).toContain('Price: 100 zł');
    expect(html).not.toContain('iPhone <13>');
  });

  it('adds description, category and tags when the detail page was read', () => {
    const { text, html } = renderEmail(
      { ...ITEM, description: 'Bateria 90% & etui', category: 'Telefony', tags: ['Używane', 'Apple'] },
      SOURCE,
    );

    expect(text.split('\n').slice(0, 7)).toEqual([
      'iPhone <13>',
      'Price: 100 zł',
      'Posted: Dzisiaj o 12:30',
      'Category: Telefony',
      'Tags: Używane, Apple',
      '',
      'Bateria 90% & etui',
    ]);
    expect(html).toContain('Bateria 90% &amp; etui');
  });
});

describe('EmailDelivery', () => {
  it('sends one mail to all recipients', async () => {
    sendMail.mockResolvedValue({ messageId: 'm-1' });

    await new EmailDelivery(emailConfig).send(ITEM, SOURCE);

    expect(sendMail).toHaveBeenCalledTimes(1);
    expect(sendMail.mock.calls[0]?.[0]).toMatchObject({
      from: 'listwatch@localhost',
      to: 'me@example.com, you@example.com',
      subject: '#phones iPhone <13> · 100 zł',
    });
  });

  it('wraps transport failures in DeliveryError', async () => {
    sendMail.mockRejectedValue(new Error('connection refused'));

    await expect(new EmailDelivery(emailConfig).send(ITEM, SOURCE)).rejects.toBeInstanceOf(
      DeliveryError,
    );
  });
});
