import { z } from 'zod';
import { BaseHttpClient } from '../clients/base/BaseHttpClient';
import type { RunSummary } from '../market-sync/run-summary';
import type { ILogger } from '../utils/logger-interface';
import { type RenderedMessage, renderAlert, renderSummary, toHtml, toPlainText } from './format';
import type { BackendAlert, Notifier } from './types';

export const RESEND_API_BASE_URL = 'https://api.resend.com';

const SendEmailResponseSchema = z.object({ id: z.string() });

export interface ResendEmailNotifierOptions {
  apiKey: string;
  /** Comma separated recipients */
  to: string;
  from: string;
  baseURL?: string;
  timeoutMs?: number;
  logger?: ILogger;
}

/**
 * Report e-mails through the Resend REST API
 */
export class ResendEmailNotifier extends BaseHttpClient implements Notifier {
  readonly name = 'email';
  private readonly apiKey: string;
  private readonly recipients: string[];
  private readonly from: string;

  constructor(options: ResendEmailNotifierOptions) {
    super({ baseURL: options.baseURL ?? RESEND_API_BASE_URL, timeoutMs: options.timeoutMs ?? 10000, logger: options.logger });
    this.apiKey = options.apiKey;
    this.from = options.from;
    this.recipients = options.to
      .split(',')
      .map((address) => address.trim())
      .filter((address) => address.length > 0);
  }

  protected override defaultHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  async notify(summary: RunSummary): Promise<void> {
    await this.send(renderSummary(summary));
  }

  async escalate(alert: BackendAlert): Promise<void> {
    await this.send(renderAlert(alert));
  }

  private async send(message: RenderedMessage): Promise<void> {
    const { id } = await this.requestJson(
      {
        method: 'POST',
        path: 'emails',
        json: {
          from: this.from,
          to: this.recipients,
          subject: message.title,
          text: toPlainText(message),
          html: toHtml(message),
        },
      },
      SendEmailResponseSchema
    );
    this.logger.debug(`Sent "${message.title}"`, { emailId: id });
  }
}
