/**
 * Plain-text and HTML renderings of run summaries and backend alerts
 */

import { type BackendSummary, type RunStatus, type RunSummary, successRate } from '../market-sync/run-summary';
import type { BackendAlert } from './types';

/** Failed symbols listed in a report; the rest are only counted */
export const MAX_LISTED_FAILURES = 20;

const STATUS_LABELS: Record<RunStatus, string> = {
  ok: 'OK',
  partial: 'PARTIAL',
  failed: 'FAILED',
};

export interface RenderedMessage {
  title: string;
  lines: string[];
}

export function renderSummary(summary: RunSummary): RenderedMessage {
  const scope = summary.market ? `${summary.market} update` : 'Sync';
  const { counts } = summary;
  const lines: string[] = [];

  if (summary.fatalError) {
    lines.push(`Error: ${summary.fatalError}`);
  }

  if (summary.market) {
    lines.push(
      `Symbols: ${counts.total} total, ${counts.fetched} fetched (${counts.updated} updated, ` +
        `${counts.unchanged} unchanged), ${counts.skipped} skipped, ${counts.failed} failed`
    );
    const rate = successRate(counts);
    if (rate !== null) {
      lines.push(`Success rate: ${(rate * 100).toFixed(1)}%`);
    }
    lines.push(
      `Rows: ${counts.rowsInserted} inserted, ${counts.rowsUpdated} updated, change-set of ${summary.changeSetSize}`
    );
  }

  if (summary.syncSkipped) {
    lines.push('Backends: sync skipped');
  } else if (summary.backends.length > 0) {
    lines.push('Backends:');
    lines.push(...summary.backends.map((backend) => `  ${formatBackend(backend)}`));
  }

  if (summary.failedSymbols.length > 0) {
    const total = summary.failedSymbols.length;
    lines.push(
      total > MAX_LISTED_FAILURES ? `Failed symbols (first ${MAX_LISTED_FAILURES} of ${total}):` : 'Failed symbols:'
    );
    for (const failed of summary.failedSymbols.slice(0, MAX_LISTED_FAILURES)) {
      lines.push(`  ${failed.symbolId}: ${failed.reason}`);
    }
  }

  if (summary.cancelled) {
    lines.push('Run was cancelled');
  }
  lines.push(`Duration: ${formatDuration(summary.durationMs)}`);

  return { title: `${scope}: ${STATUS_LABELS[summary.status]}`, lines };
}

export function renderAlert(alert: BackendAlert): RenderedMessage {
  return {
    title: `Backend ${alert.backend} needs attention`,
    lines: [`Failure: ${alert.failure}`, `Location: ${alert.location}`, `Message: ${alert.message}`],
  };
}

export function formatBackend(backend: BackendSummary): string {
  const attempts = `${backend.attempts} attempt${backend.attempts === 1 ? '' : 's'}`;
  const audit = backend.audit ? `, audit ${backend.audit}` : '';
  const error = backend.error ? `: ${backend.error}` : '';
  return `${backend.backend} ${backend.outcome} after ${attempts}${audit}${error}`;
}

export function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

export function toPlainText(message: RenderedMessage): string {
  return [message.title, '', ...message.lines].join('\n');
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function toHtml(message: RenderedMessage): string {
  return [
    '<!doctype html>',
    '<html><body style="font-family: sans-serif">',
    `<h2>${escapeHtml(message.title)}</h2>`,
    `<pre>${escapeHtml(message.lines.join('\n'))}</pre>`,
    '</body></html>',
  ].join('\n');
}
