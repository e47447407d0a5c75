#!/usr/bin/env node
// src/index.ts
import 'dotenv/config';

import { ApplicationBootstrapper, installProcessHandlers } from './bootstrap/ApplicationBootstrapper';
import { CliUsageError, USAGE, parseArgs } from './cli/CommandLine';
import { Logger } from './utils/logger';

const log = new Logger('main');

async function main(argv: string[]): Promise<void> {
  installProcessHandlers();

  const opts = parseArgs(argv);
  const boot = new ApplicationBootstrapper();
  const ctx = boot.wire();

  if (opts.command === 'serve') {
    const { server, scheduler } = await boot.serve(ctx);
    const shutdown = (signal: string) => {
      log.info(`${signal} received, shutting down`);
      scheduler.stop();
      server.close(() => {
        ctx.db.close();
        process.exit(0);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    return;
  }

  try {
    // eslint-disable-next-line no-console
    await boot.runCommand(ctx, opts, (line) => console.log(line));
  } finally {
    ctx.db.close();
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    // eslint-disable-next-line no-console
    console.error(`${err.message}\n\n${USAGE}`);
  } else {
    log.error('Command failed', err);
  }
  process.exit(1);
});
