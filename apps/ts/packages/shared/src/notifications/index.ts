import type { NotificationConfig } from '../config';
import type { ILogger } from '../utils/logger-interface';
import { CompositeNotifier } from './composite-notifier';
import { ResendEmailNotifier } from './resend-email-notifier';
import { TelegramNotifier } from './telegram-notifier';
import type { Notifier } from './types';

export { CompositeNotifier, NotificationError } from './composite-notifier';
export * from './format';
export { ResendEmailNotifier, type ResendEmailNotifierOptions } from './resend-email-notifier';
export { TelegramNotifier, type TelegramNotifierOptions, toTelegramHtml } from './telegram-notifier';
export type { AlertSink, BackendAlert, Notifier } from './types';

/**
 * Notifier over every channel with credentials in the configuration
 */
export function createNotifier(config: NotificationConfig, logger?: ILogger): CompositeNotifier {
  const channels: Notifier[] = [];
  if (config.telegram) {
    channels.push(new TelegramNotifier({ ...config.telegram, logger }));
  }
  if (config.email) {
    channels.push(new ResendEmailNotifier({ ...config.email, logger }));
  }
  return new CompositeNotifier(channels, logger);
}
