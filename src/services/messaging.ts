import axios from 'axios';
import { AppConfig } from '../config';
import { MessagingFailure, errorMessage } from '../errors';
import { OutboundAction } from '../types';
import { sleep } from '../utils/asyncLock';

export interface Messenger {
  readonly channel: string;
  sendText(to: string, body: string): Promise<void>;
  sendTemplate(to: string, templateId: string, variables: Record<string, string>): Promise<void>;
}

interface TwilioMessageResponse {
  sid: string;
  status: string;
}

type TwilioSettings = AppConfig['twilio'] & { maxMessageLength: number };

const WHATSAPP_PREFIX = 'whatsapp:';
const CHUNK_SUFFIX_ROOM = 10; // " (12/34)" plus slack

export const toWhatsApp = (address: string) =>
  address.startsWith(WHATSAPP_PREFIX) ? address : `${WHATSAPP_PREFIX}${address}`;

/**
 * Splits text over `max` characters into numbered parts: "... (1/3)".
 * Each part, suffix included, stays within `max`.
 */
export const chunkMessage = (text: string, max: number): string[] => {
  if (text.length <= max) return [text];
  const size = Math.max(1, max - CHUNK_SUFFIX_ROOM);
  const parts: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    parts.push(text.slice(i, i + size));
  }
  return parts.map((part, i) => `${part} (${i + 1}/${parts.length})`);
};

/**
 * WhatsApp over the Twilio REST API (no SDK needed).
 */
export class TwilioMessenger implements Messenger {
  readonly channel = 'twilio';
  private baseUrl: string;

  constructor(private readonly settings: TwilioSettings) {
    this.baseUrl = `https://api.twilio.com/2010-04-01/Accounts/${settings.accountSid}`;
  }

  static isConfigured(settings: AppConfig['twilio']): boolean {
    return !!(settings.accountSid && settings.authToken && settings.fromNumber);
  }

  async sendText(to: string, body: string): Promise<void> {
    const chunks = chunkMessage(body, this.settings.maxMessageLength);
    for (let i = 0; i < chunks.length; i++) {
      const sid = await this.post({ To: toWhatsApp(to), Body: chunks[i] });
      if (chunks.length > 1) console.log(`[messaging] Sent chunk ${i + 1}/${chunks.length} to ${to} (${sid})`);
      if (i < chunks.length - 1) await sleep(this.settings.chunkDelayMs);
    }
  }

  async sendTemplate(to: string, templateId: string, variables: Record<string, string>): Promise<void> {
    await this.post({
      To: toWhatsApp(to),
      ContentSid: templateId,
      ContentVariables: JSON.stringify(variables),
    });
  }

  private async post(fields: Record<string, string>): Promise<string> {
    const form = new URLSearchParams({ From: toWhatsApp(this.settings.fromNumber), ...fields });
    try {
      const res = await axios.post<TwilioMessageResponse>(`${this.baseUrl}/Messages.json`, form.toString(), {
        auth: { username: this.settings.accountSid, password: this.settings.authToken },
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        timeout: 20_000,
      });
      return res.data.sid;
    } catch (error: unknown) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new MessagingFailure(`Twilio send failed: ${errorMessage(error)}`, status);
    }
  }
}

/** Prints outbound messages. Used when Twilio credentials are absent. */
export class ConsoleMessenger implements Messenger {
  readonly channel = 'console';

  async sendText(to: string, body: string): Promise<void> {
    console.log(`[messaging] -> ${to}\n${body}`);
  }

  async sendTemplate(to: string, templateId: string, variables: Record<string, string>): Promise<void> {
    console.log(`[messaging] -> ${to} template=${templateId} ${JSON.stringify(variables)}`);
  }
}

export const createMessenger = (config: AppConfig): Messenger => {
  if (TwilioMessenger.isConfigured(config.twilio)) {
    return new TwilioMessenger({ ...config.twilio, maxMessageLength: config.workflow.maxMessageLength });
  }
  console.warn('[messaging] Twilio not configured; outbound messages go to the console');
  return new ConsoleMessenger();
};

/**
 * Sends actions in order, waiting out each action's delay first.
 * Delivery is best-effort: a failed send is logged and the rest continue.
 * Returns the number of actions that failed.
 */
export const dispatchActions = async (messenger: Messenger, actions: OutboundAction[]): Promise<number> => {
  let failed = 0;
  for (const action of actions) {
    if (action.delayMs) await sleep(action.delayMs);
    try {
      if (action.kind === 'text') {
        await messenger.sendText(action.recipientId, action.text);
      } else if (action.templateId) {
        await messenger.sendTemplate(action.recipientId, action.templateId, action.variables);
      } else {
        await messenger.sendText(action.recipientId, action.fallbackText);
      }
    } catch (error: unknown) {
      failed += 1;
      console.error(`[messaging] ❌ Failed to send ${action.kind} to ${action.recipientId}:`, errorMessage(error));
    }
  }
  return failed;
};
