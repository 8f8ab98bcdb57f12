#!/usr/bin/env node
/**
 * assetpilot CLI
 *
 * Ask questions about assets and their measurements from the terminal.
 */

import 'dotenv/config';

import { Command } from 'commander';
import inquirer from 'inquirer';

import { VERSION } from '../index.js';
import { createSession, createToolRegistry } from '../agent/factory.js';
import { loadConfig, type AssetPilotConfig } from '../core/config.js';
import { describeError } from '../core/errors.js';
import { clearChatMessages, pruneChatMessages } from '../memory/chat.js';

interface GlobalOptions {
  config?: string;
  session: string;
}

const program = new Command();

program
  .name('assetpilot')
  .description('Conversational assistant for asset time-series data')
  .version(VERSION)
  .option('-c, --config <path>', 'Config file path')
  .option('-s, --session <id>', 'Conversation session id', 'default');

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function cliConfig(): AssetPilotConfig {
  return loadConfig(globalOptions().config);
}

/**
 * Run a command body, reporting failures instead of throwing out of commander.
 */
function run<A extends unknown[]>(body: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await body(...args);
    } catch (error) {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = 1;
    }
  };
}

// ============================================================================
// Conversation Commands
// ============================================================================

program
  .command('ask <message...>')
  .description('Send one message and print the answer')
  .option('--json', 'Print the full response as JSON')
  .action(
    run(async (message: string[], options: { json?: boolean }) => {
      const session = createSession(cliConfig(), { sessionId: globalOptions().session });
      const response = await session.processMessage(message.join(' '));
      if (options.json) {
        console.log(JSON.stringify(response, null, 2));
        return;
      }
      console.log(response.text);
    })
  );

program
  .command('chat')
  .description('Interactive conversation (/exit to quit, /reset to clear history)')
  .action(
    run(async () => {
      const session = createSession(cliConfig(), { sessionId: globalOptions().session });
      console.log('assetpilot chat. Type /exit to quit, /reset to clear history.');
      console.log('─'.repeat(60));

      for (;;) {
        const answers = await inquirer.prompt<{ message: string }>([
          { type: 'input', name: 'message', message: 'you>' },
        ]);
        const text = answers.message.trim();
        if (!text) continue;
        if (text === '/exit') break;
        if (text === '/reset') {
          session.history.clear();
          console.log('History cleared.');
          continue;
        }
        const response = await session.processMessage(text);
        console.log(`\n${response.text}\n`);
      }
    })
  );

program
  .command('info')
  .description('Show the configured model and tools')
  .action(
    run(async () => {
      const session = createSession(cliConfig(), { sessionId: globalOptions().session });
      const info = session.describeSession();
      console.log('Session');
      console.log('─'.repeat(40));
      console.log(`Model: ${info.model}`);
      console.log(`Temperature: ${info.temperature}`);
      console.log(`Max tokens: ${info.maxTokens}`);
      console.log(`Tools: ${info.tools.join(', ')}`);
    })
  );

// ============================================================================
// Tool Commands
// ============================================================================

const tools = program.command('tools').description('Callable tools');

tools
  .command('list')
  .description('List tools available to the model')
  .action(
    run(async () => {
      const registry = createToolRegistry(cliConfig());
      for (const tool of registry.list()) {
        console.log(`${tool.name} [${tool.category}]`);
        console.log(`  ${tool.description}`);
      }
    })
  );

// ============================================================================
// History Commands
// ============================================================================

const history = program.command('history').description('Persistent chat history (sqlite backend)');

history
  .command('clear')
  .description('Delete the stored messages of a session')
  .action(
    run(async () => {
      const config = cliConfig();
      if (config.memory.backend !== 'sqlite') {
        console.log('History is kept in memory only; nothing to clear.');
        return;
      }
      const sessionId = globalOptions().session;
      const removed = clearChatMessages(sessionId, config.memory.dbPath);
      console.log(`Cleared ${removed} message(s) from session ${sessionId}.`);
    })
  );

history
  .command('prune')
  .description('Prune old chat messages')
  .option('-d, --days <number>', 'Retention days')
  .action(
    run(async (options: { days?: string }) => {
      const config = cliConfig();
      const days = options.days === undefined ? config.memory.retentionDays : Number(options.days);
      if (Number.isNaN(days) || days <= 0) {
        console.log('Days must be a positive number.');
        return;
      }
      const pruned = pruneChatMessages(days, config.memory.dbPath);
      console.log(`Pruned ${pruned} chat message(s).`);
    })
  );

// ============================================================================
// Parse and Run
// ============================================================================

await program.parseAsync();
