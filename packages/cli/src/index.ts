#!/usr/bin/env node

/**
 * Switchboard - natural-language tool dispatch
 *
 * Main entry point for the application.
 */

import chalk from 'chalk';
import { loadConfig, ensureAppDirs, getLogsDir, setProjectRoot } from './utils/config.js';
import { logger, setConsoleLoggingEnabled } from './utils/logger.js';
import { getVersion } from './utils/version.js';
import { createRuntime, type Runtime } from './core/index.js';
import { Repl, isCommand, runCommand } from './cli/index.js';

function getHelpText(): string {
  return [
    'Switchboard - answer questions about posts by dispatching to tools through a local LLM',
    '',
    'Usage:',
    '  switchboard                      Start the interactive REPL',
    '  switchboard ask <query...>       Run one natural-language turn',
    '  switchboard tool <name> <json>   Call a tool directly',
    '  switchboard post <id>            Fetch a post',
    '  switchboard comments <id>        Fetch the comments of a post',
    '  switchboard tools                List available tools',
    '',
    'Options:',
    '  --help     Show this help and exit',
    '  --version  Show version and exit'
  ].join('\n');
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  if (args.includes('--help')) {
    console.log(getHelpText());
    return 0;
  }

  if (args.includes('--version')) {
    console.log(`switchboard ${getVersion()}`);
    return 0;
  }

  const [command, ...rest] = args;
  if (command === undefined) {
    await new Repl({ runtime: initialize() }).start();
    return 0;
  }

  if (!isCommand(command)) {
    console.error(chalk.red(`Unknown command: ${command}`));
    console.error(getHelpText());
    return 1;
  }

  return runCommand(command, rest, initialize(), text => console.log(text));
}

function initialize(): Runtime {
  setProjectRoot(process.cwd());
  const cfg = loadConfig();
  ensureAppDirs(cfg);

  setConsoleLoggingEnabled(false);
  logger.init(getLogsDir(cfg));
  logger.info('Initializing Switchboard', { version: getVersion() });

  return createRuntime(cfg);
}

main()
  .then(code => {
    logger.close();
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(chalk.red('\n❌ Fatal error:'), error);
    logger.error(`Fatal error: ${String(error)}`);
    logger.close();
    process.exitCode = 1;
  });
