import { z } from 'zod';
import { BaseHttpClient } from '../clients/base/BaseHttpClient';
import type { RunSummary } from '../market-sync/run-summary';
import type { ILogger } from '../utils/logger-interface';
import { escapeHtml, type RenderedMessage, renderAlert, renderSummary } from './format';
import type { BackendAlert, Notifier } from './types';

export const TELEGRAM_API_BASE_URL = 'https://api.telegram.org';

/** sendMessage rejects longer texts */
const MAX_MESSAGE_LENGTH = 4096;

const SendMessageResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: ILogger;
}

export class TelegramNotifier extends BaseHttpClient implements Notifier {
  readonly name = 'telegram';
  private readonly botToken: string;
  private readonly chatId: string;

  constructor(options: TelegramNotifierOptions) {
    super({ baseURL: options.baseURL ?? TELEGRAM_API_BASE_URL, timeoutMs: options.timeoutMs ?? 10000, logger: options.logger });
    this.botToken = options.botToken;
    this.chatId = options.chatId;
  }

  async notify(summary: RunSummary): Promise<void> {
    await this.send(renderSummary(summary));
  }

  async escalate(alert: BackendAlert): Promise<void> {
    await this.send(renderAlert(alert));
  }

  protected override redactUrl(url: string): string {
    return url.split(this.botToken).join('***');
  }

  private async send(message: RenderedMessage): Promise<void> {
    const response = await this.requestJson(
      {
        method: 'POST',
        path: `bot${this.botToken}/sendMessage`,
        json: {
          chat_id: this.chatId,
          text: toTelegramHtml(message),
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        },
      },
      SendMessageResponseSchema
    );
    if (!response.ok) {
      throw new Error(`Telegram rejected the message: ${response.description ?? 'no description'}`);
    }
  }
}

/**
 * Bold title followed by the escaped lines, cut to the sendMessage limit
 */
export function toTelegramHtml(message: RenderedMessage): string {
  const title = `<b>${escapeHtml(message.title)}</b>`;
  let body = escapeHtml(message.lines.join('\n'));
  const room = MAX_MESSAGE_LENGTH - title.length - 2;
  if (body.length > room) {
    // cut at a line break so no entity is split
    const cut = body.lastIndexOf('\n', room - 2);
    body = `${body.slice(0, cut > 0 ? cut : 0)}\n…`;
  }
  return `${title}\n\n${body}`;
}
