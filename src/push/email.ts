/**
 * Email channel: one plain-text + MJML-rendered HTML mail per listing via nodemailer.
 * Only used when config.delivery.email.enabled = true.
 */

import nodemailer from 'nodemailer';
import mjml2html from 'mjml';
import type { Transporter } from 'nodemailer';
import type { TrackedSource } from '../source/adapter.js';
import type { ClassifiedItem } from '../scan/freshness.js';
import type { DeliveryConfig } from '../shared/config.js';
import type { Delivery } from './delivery.js';
import { DeliveryError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

type EmailConfig = DeliveryConfig['email'];

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function detailRows(item: ClassifiedItem): Array<[string, string]> {
  const details: Array<[string, string | undefined]> = [
    ['Price', item.price],
    ['Location', item.location],
    ['Posted', item.postedText],
    ['Category', item.category],
    ['Tags', item.tags && item.tags.length > 0 ? item.tags.join(', ') : undefined],
  ];
  return details.filter((d): d is [string, string] => Boolean(d[1]));
}

function buildMjml(item: ClassifiedItem, source: TrackedSource, rows: Array<[string, string]>): string {
  const tag = source.hashtag ? `${source.hashtag} · ` : '';
  return `
<mjml>
  <mj-head>
    <mj-title>${escapeHtml(item.title)}</mj-title>
    <mj-attributes>
      <mj-all font-family="-apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif" />
      <mj-text color="#1a1a1a" font-size="14px" line-height="1.6" />
    </mj-attributes>
  </mj-head>
  <mj-body background-color="#ffffff">
    <mj-section padding="16px 24px 8px">
      <mj-column>
        <mj-text font-size="18px" font-weight="bold" padding="0 0 8px">
          <a href="${escapeHtml(item.url)}" style="color:#1a1a1a;text-decoration:none;">${escapeHtml(item.title)}</a>
        </mj-text>
        ${item.image ? `<mj-image src="${escapeHtml(item.image)}" alt="" padding="0 0 8px" />` : ''}
        ${rows
          .map(
            ([label, value]) =>
              `<mj-text padding="0" font-size="13px">${label}: ${escapeHtml(value)}</mj-text>`,
          )
          .join('\n        ')}
        ${
          item.description
            ? `<mj-text padding="8px 0 0" font-size="13px" color="#444444">${escapeHtml(item.description)}</mj-text>`
            : ''
        }
        <mj-divider border-color="#eeeeee" border-width="1px" padding="12px 0" />
        <mj-text font-size="11px" color="#888888" padding="0">
          ${escapeHtml(tag)}${escapeHtml(source.url)}
        </mj-text>
      </mj-column>
    </mj-section>
  </mj-body>
</mjml>`;
}

export function renderEmail(
  item: ClassifiedItem,
  source: TrackedSource,
): { subject: string; text: string; html: string } {
  const tag = source.hashtag ? `${source.hashtag} ` : '';
  const subject = `${tag}${item.title}${item.price ? ` · ${item.price}` : ''}`;
  const rows = detailRows(item);

  const text = [
    item.title,
    ...rows.map(([label, value]) => `${label}: ${value}`),
    ...(item.description ? ['', item.description] : []),
    '',
    item.url,
    '',
    `Source: ${source.url}`,
  ].join('\n');

  const { html, errors } = mjml2html(buildMjml(item, source, rows), { validationLevel: 'soft' });
  if (errors.length > 0) {
    logger.warn({ errors: errors.map((e) => e.message), url: item.url }, 'MJML compilation warnings');
  }

  return { subject, text, html };
}

export class EmailDelivery implements Delivery {
  readonly name = 'email';
  private readonly transporter: Transporter;

  constructor(private readonly config: EmailConfig) {
    this.transporter = nodemailer.createTransport({
      host: config.smtp_host,
      port: config.smtp_port,
      secure: config.smtp_port === 465,
      auth: config.smtp_user ? { user: config.smtp_user, pass: config.smtp_pass } : undefined,
    });
  }

  async send(item: ClassifiedItem, source: TrackedSource): Promise<void> {
    const { subject, text, html } = renderEmail(item, source);
    try {
      const info = await this.transporter.sendMail({
        from: this.config.from,
        to: this.config.to.join(', '),
        subject,
        text,
        html,
      });
      logger.debug({ messageId: info.messageId, url: item.url }, 'Listing email sent');
    } catch (err) {
      throw new DeliveryError(
        `Email send failed: ${err instanceof Error ? err.message : String(err)}`,
        { url: item.url },
      );
    }
  }
}
