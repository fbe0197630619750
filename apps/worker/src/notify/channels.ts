import type { ServerEnv } from '@dealwatch/shared';

import type { FetchLike } from '../woot/client.js';
import type { DealAlert } from './render.js';

/** Resolves once the alert is delivered; rejects otherwise. */
export interface Notifier {
  readonly name: string;
  send(alert: DealAlert): Promise<void>;
}

export class ResendEmailNotifier implements Notifier {
  readonly name = 'email';

  constructor(
    private readonly cfg: { apiKey: string; from: string; to: string },
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async send(alert: DealAlert): Promise<void> {
    const res = await this.fetchImpl('https://api.resend.com/emails', {
      method: 'POST',
      headers: {
        authorization: `Bearer ${this.cfg.apiKey}`,
        'content-type': 'application/json',
      },
      body: JSON.stringify({
        from: this.cfg.from,
        to: [this.cfg.to],
        subject: alert.subject,
        text: alert.text,
        html: alert.html,
      }),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new Error(`resend_http:${res.status}:${text.slice(0, 300)}`);
    }
  }
}

export class TwilioSmsNotifier implements Notifier {
  readonly name = 'sms';

  constructor(
    private readonly cfg: { accountSid: string; authToken: string; from: string; to: string },
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async send(alert: DealAlert): Promise<void> {
    const url = `https://api.twilio.com/2010-04-01/Accounts/${encodeURIComponent(this.cfg.accountSid)}/Messages.json`;
    const credentials = Buffer.from(`${this.cfg.accountSid}:${this.cfg.authToken}`, 'utf8').toString('base64');
    const res = await this.fetchImpl(url, {
      method: 'POST',
      headers: {
        authorization: `Basic ${credentials}`,
        'content-type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ To: this.cfg.to, From: this.cfg.from, Body: alert.sms }).toString(),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new Error(`twilio_http:${res.status}:${text.slice(0, 300)}`);
    }
  }
}

/** Delivers through every channel in order; the first failure fails the send. */
export class MultiNotifier implements Notifier {
  readonly name: string;

  constructor(private readonly channels: readonly Notifier[]) {
    if (!channels.length) throw new Error('notifier_unconfigured');
    this.name = channels.map((c) => c.name).join('+');
  }

  async send(alert: DealAlert): Promise<void> {
    for (const channel of this.channels) {
      await channel.send(alert);
    }
  }
}

export function createNotifier(env: ServerEnv, fetchImpl: FetchLike = fetch): Notifier {
  const channels: Notifier[] = [];
  if (env.RESEND_API_KEY && env.EMAIL_FROM && env.EMAIL_RECIPIENT) {
    channels.push(new ResendEmailNotifier({ apiKey: env.RESEND_API_KEY, from: env.EMAIL_FROM, to: env.EMAIL_RECIPIENT }, fetchImpl));
  }
  if (env.TWILIO_ACCOUNT_SID && env.TWILIO_AUTH_TOKEN && env.TWILIO_FROM && env.SMS_RECIPIENT) {
    channels.push(
      new TwilioSmsNotifier(
        { accountSid: env.TWILIO_ACCOUNT_SID, authToken: env.TWILIO_AUTH_TOKEN, from: env.TWILIO_FROM, to: env.SMS_RECIPIENT },
        fetchImpl,
      ),
    );
  }
  if (!channels.length) {
    throw new Error(
      'No notification channel configured. Set RESEND_API_KEY, EMAIL_FROM, EMAIL_RECIPIENT and/or TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_FROM, SMS_RECIPIENT.',
    );
  }
  return channels.length === 1 && channels[0] ? channels[0] : new MultiNotifier(channels);
}
