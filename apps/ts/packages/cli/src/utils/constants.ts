/**
 * CLI Constants
 */

export const CLI_NAME = 'stock-warehouse';
export const CLI_VERSION = '0.1.0';
export const CLI_DESCRIPTION = 'Daily price warehouse for TW, US and HK equities with two remote backups';

/**
 * Exit codes for runs that end without an exception (sysexits.h where one fits)
 */
export const EXIT_CODES = {
  ok: 0,
  failed: 1,
  partial: 2,
  upstreamUnavailable: 69,
  runConflict: 75,
  config: 78,
} as const;
