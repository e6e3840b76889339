#!/usr/bin/env node
import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { preloadPrompts } from './core/prompts.js';
import { createRuntime } from './runtime.js';

const FRAME_BAR = '─'.repeat(44);

type Styler = (value: string) => string;

interface BlockParts {
  top: string;
  body: string;
  bottom: string;
}

function createBlock(title: string, message: string, accent: Styler, body: Styler): BlockParts {
  const lines = message.split('\n').map((line) => (line.length === 0 ? ' ' : line));
  const topPlain = `┌─ ${title.toUpperCase()} ${FRAME_BAR}`;
  const bottomPlain = `└${'─'.repeat(Math.max(topPlain.length - 1, 0))}`;
  const prefixed = lines
    .map((line) => `${accent('│')} ${body(line)}`)
    .join('\n');
  return {
    top: accent(topPlain),
    body: prefixed,
    bottom: accent(bottomPlain),
  };
}

function printBlock(block: BlockParts) {
  console.log(block.top);
  if (block.body.length > 0) console.log(block.body);
  console.log(block.bottom);
}

async function main() {
  // Quiet by default so log lines don't interleave with the conversation
  process.env.LOG_LEVEL ??= 'error';
  const runtime = createRuntime();
  const { orchestrator, log } = runtime;
  await preloadPrompts().catch((err: unknown) => log.warn({ err }, 'prompt_preload_failed'));

  const rl = readline.createInterface({ input, output });
  let sessionId: string | undefined;

  console.log(chalk.yellow.bold('📺  TV series assistant — ask about any show!'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log(
    chalk.green('• Find a series by title, get details, discover similar shows\n') +
      chalk.green('• Ask for recommendations by genre or network\n') +
      chalk.blue('Commands: /reset (new conversation), ') +
      chalk.red('/exit (quit)'),
  );
  console.log(chalk.gray('─'.repeat(60)));
  console.log();

  try {
    while (true) {
      const q = (await rl.question(chalk.blue.bold('You> '))).trim();
      if (!q) continue;
      const command = q.toLowerCase();
      if (command === '/exit' || command === 'exit') break;
      if (command === '/reset') {
        if (sessionId) orchestrator.endSession(sessionId);
        sessionId = undefined;
        console.log(chalk.gray('Started a new conversation.'));
        continue;
      }

      log.debug({ sessionId }, 'cli_message');
      try {
        const res = await orchestrator.handleMessage(q, sessionId);
        sessionId = res.sessionId;
        console.log();
        printBlock(createBlock('Assistant', res.replyText, chalk.greenBright, chalk.white));
        console.log();
      } catch (error) {
        const details = error instanceof Error ? error.message : String(error);
        console.log(chalk.red(`❌ Error processing request: ${details}`));
      }
    }
  } finally {
    rl.close();
    await runtime.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
