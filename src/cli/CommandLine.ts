// src/cli/CommandLine.ts
import type { FunnelType } from '../contracts/domain';
import { isFunnelType } from '../contracts/domain';

export const COMMANDS = [
  'sync-funnels',
  'sync-purchases',
  'run-outbox',
  'requeue-errors',
  'report',
  'run-all',
  'serve',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export type CliOptions = {
  command: CommandName;
  limit?: number;
  /** Report window in days; 0 means all time. */
  days: number;
  funnel?: FunnelType;
};

export const DEFAULT_REPORT_DAYS = 30;

export const USAGE = [
  'Usage: funnel-sync <command> [options]',
  '',
  'Commands:',
  '  sync-funnels      add new test takers to the funnels and queue contact upserts',
  '  sync-purchases    flag certificate purchases and queue contact updates',
  '  run-outbox        deliver pending outbox jobs to Brevo',
  '  requeue-errors    move failed outbox jobs back to pending',
  '  report            print the funnel conversion report',
  '  run-all           sync-funnels, sync-purchases, then run-outbox',
  '  serve             start the admin HTTP API and the periodic sync',
  '',
  'Options:',
  '  --limit N                       batch size (rows or jobs)',
  `  --days N                        report window in days, 0 = all time (default ${DEFAULT_REPORT_DAYS})`,
  '  --funnel language|non_language  restrict the report to one funnel',
].join('\n');

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function isCommand(v: string): v is CommandName {
  return COMMANDS.some((c) => c === v);
}

function readInt(flag: string, raw: string | undefined, min: number): number {
  if (raw === undefined || raw.trim() === '') throw new CliUsageError(`${flag} needs a value`);
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new CliUsageError(`${flag} must be an integer >= ${min}, got '${raw}'`);
  }
  return n;
}

/** Accepts `--flag value` and `--flag=value`. */
export function parseArgs(argv: readonly string[]): CliOptions {
  const [command, ...rest] = argv;
  if (!command) throw new CliUsageError('missing command');
  if (!isCommand(command)) throw new CliUsageError(`unknown command '${command}'`);

  const opts: CliOptions = { command, days: DEFAULT_REPORT_DAYS };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    let value: string | undefined = eq >= 0 ? arg.slice(eq + 1) : undefined;
    if (eq < 0 && (flag === '--limit' || flag === '--days' || flag === '--funnel')) {
      i++;
      value = rest[i];
    }

    switch (flag) {
      case '--limit':
        opts.limit = readInt(flag, value, 1);
        break;
      case '--days':
        opts.days = readInt(flag, value, 0);
        break;
      case '--funnel': {
        if (!isFunnelType(value)) throw new CliUsageError('--funnel must be language or non_language');
        opts.funnel = value;
        break;
      }
      default:
        throw new CliUsageError(`unknown option '${arg}'`);
    }
  }
  return opts;
}
