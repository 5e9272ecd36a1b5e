#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { LogLevel } from '@nestjs/common';
import { Command } from 'commander';
import * as readline from 'node:readline';
import { AppModule } from './app.module';
import { AuctionShell } from './shell/auction-shell';

const LOG_LEVELS: readonly LogLevel[] = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function parseLogLevels(raw: string): LogLevel[] {
  return raw
    .split(',')
    .map((level) => level.trim())
    .filter(isLogLevel);
}

async function runShell(opts: { logLevel: string }): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: parseLogLevels(opts.logLevel),
  });
  app.enableShutdownHooks();
  const shell = app.get(AuctionShell);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  console.log('Welcome to the Auction House! Type "help" for commands.');
  rl.setPrompt('> ');
  rl.prompt();

  try {
    for await (const line of rl) {
      const reply = await shell.execute(line);
      for (const out of reply.lines) console.log(out);
      if (reply.exit) break;
      rl.prompt();
    }
  } finally {
    rl.close();
    await app.close();
  }
}

const program = new Command();
program
  .name('auction-house')
  .description('Interactive in-memory auction marketplace')
  .version('0.1.0')
  .option(
    '--log-level <levels>',
    'Comma-separated log levels (verbose,debug,log,warn,error,fatal)',
    process.env.LOG_LEVEL ?? 'warn,error',
  )
  .action(async (opts: { logLevel: string }) => {
    await runShell(opts);
  });

if (require.main === module) {
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
