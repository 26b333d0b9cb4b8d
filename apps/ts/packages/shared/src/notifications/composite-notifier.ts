import type { RunSummary } from '../market-sync/run-summary';
import { getErrorMessage, toError } from '../utils/error-helpers';
import { logger as defaultLogger } from '../utils/logger';
import type { ILogger } from '../utils/logger-interface';
import type { BackendAlert, Notifier } from './types';

/**
 * Raised after every channel was tried and at least one failed
 */
export class NotificationError extends Error {
  constructor(readonly failures: ReadonlyArray<{ channel: string; error: Error }>) {
    super(`Notification failed on ${failures.map((failure) => `${failure.channel} (${failure.error.message})`).join(', ')}`);
    this.name = 'NotificationError';
  }
}

/**
 * Fans a report out to every configured channel
 */
export class CompositeNotifier implements Notifier {
  readonly name = 'composite';
  private readonly logger: ILogger;

  constructor(
    readonly channels: readonly Notifier[],
    logger?: ILogger
  ) {
    this.logger = (logger ?? defaultLogger).child({ component: 'notifier' });
  }

  async notify(summary: RunSummary): Promise<void> {
    await this.deliver('report', (channel) => channel.notify(summary));
  }

  async escalate(alert: BackendAlert): Promise<void> {
    await this.deliver('alert', (channel) => channel.escalate(alert));
  }

  private async deliver(what: string, send: (channel: Notifier) => Promise<void>): Promise<void> {
    if (this.channels.length === 0) {
      this.logger.debug(`No notification channel configured, ${what} not sent`);
      return;
    }

    const results = await Promise.allSettled(this.channels.map((channel) => send(channel)));
    const failures: Array<{ channel: string; error: Error }> = [];
    results.forEach((result, index) => {
      const channel = this.channels[index]?.name ?? `#${index}`;
      if (result.status === 'fulfilled') {
        this.logger.debug(`Sent ${what} via ${channel}`);
      } else {
        this.logger.warn(`Failed to send ${what} via ${channel}: ${getErrorMessage(result.reason)}`);
        failures.push({ channel, error: toError(result.reason) });
      }
    });

    if (failures.length > 0) {
      throw new NotificationError(failures);
    }
  }
}
