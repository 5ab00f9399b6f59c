#!/usr/bin/env node
/**
 * tg-zulip-bridge: forwards a Telegram group chat into a Zulip stream.
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { runBridge } from './commands/run.js';
import { runSend } from './commands/send.js';
import { runLookup } from './commands/lookup.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const program = new Command();

program
  .name('tg-zulip-bridge')
  .description('Forward Telegram messages, replies, mentions, files and edits to a Zulip stream')
  .version(pkg.version);

program
  .command('run', { isDefault: true })
  .description('Poll Telegram and forward to Zulip until interrupted')
  .option('-c, --config <path>', 'Path to config file (default: ./bridge.json, ./bridge.yaml)')
  .option('-d, --debug', 'Enable debug logging')
  .action(async (opts: { config?: string; debug?: boolean }) => {
    await runBridge(opts);
  });

program
  .command('send <text>')
  .description('Post a test message to the configured Zulip stream')
  .option('-c, --config <path>', 'Path to config file')
  .option('-t, --topic <topic>', 'Topic to post to (default: configured topic, else "Test")')
  .action(async (text: string, opts: { config?: string; topic?: string }) => {
    await runSend(text, opts);
  });

program
  .command('lookup <chatId> <messageId>')
  .description('Show the Zulip message a Telegram message was forwarded as')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (chatId: string, messageId: string, opts: { config?: string }) => {
    await runLookup(chatId, messageId, opts);
  });

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
