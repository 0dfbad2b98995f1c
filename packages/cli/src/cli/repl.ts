/**
 * Interactive REPL
 *
 * One session per REPL run. Ctrl+C cancels the turn in flight; with nothing
 * running it exits.
 */

import { randomUUID } from 'node:crypto';
import readline from 'node:readline';
import chalk from 'chalk';
import type { Runtime } from '../core/index.js';
import { setConsoleLoggingEnabled } from '../utils/logger.js';
import { parseToolArgs, runTool, type Write } from './commands.js';
import { formatToolList, formatTurnResult } from './output.js';

export interface ReplOptions {
  runtime: Runtime;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const HELP_TEXT = [
  'Ask about posts and their comments in plain language, e.g. "show me post 2".',
  '',
  'Commands:',
  '  /tools              List available tools',
  '  /tool <name> <json> Call a tool directly, e.g. /tool post_call {"post_id": 2}',
  '  /reset              Forget this conversation',
  '  /help               Show this help',
  '  /exit               Quit'
].join('\n');

export class Repl {
  private readonly runtime: Runtime;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly sessionId = randomUUID();
  private inFlight: AbortController | null = null;

  constructor(options: ReplOptions) {
    this.runtime = options.runtime;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async start(): Promise<void> {
    setConsoleLoggingEnabled(false);

    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      prompt: chalk.cyan('› ')
    });

    rl.on('SIGINT', () => {
      if (this.inFlight) {
        this.inFlight.abort();
      } else {
        rl.close();
      }
    });

    this.write('');
    this.write(chalk.cyan.bold('  Switchboard') + chalk.dim(` - ${this.runtime.agent.getModel()}`));
    this.write(chalk.dim('  Type /help for commands.'));
    this.write('');
    rl.prompt();

    for await (const line of rl) {
      const keepGoing = await this.handleLine(line.trim());
      if (!keepGoing) break;
      rl.prompt();
    }

    rl.close();
    this.runtime.agent.endSession(this.sessionId);
  }

  /**
   * @returns false once the user asked to leave
   */
  async handleLine(line: string): Promise<boolean> {
    if (!line) return true;

    if (line.startsWith('/')) {
      return this.handleCommand(line);
    }

    const result = await this.withAbort(signal => this.runtime.agent.handleTurn(this.sessionId, line, { signal }));
    this.write(formatTurnResult(result));
    return true;
  }

  private async handleCommand(line: string): Promise<boolean> {
    const [command = '', ...rest] = line.split(/\s+/);

    switch (command) {
      case '/exit':
      case '/quit':
        return false;

      case '/help':
        this.write(HELP_TEXT);
        return true;

      case '/tools':
        this.write(formatToolList(this.runtime.agent.listTools()));
        return true;

      case '/reset':
        this.runtime.agent.endSession(this.sessionId);
        this.write(chalk.gray('Conversation cleared.'));
        return true;

      case '/tool': {
        const [toolName, ...json] = rest;
        if (!toolName) {
          this.write(chalk.red('Usage: /tool <name> <json-args>'));
          return true;
        }
        const parsed = parseToolArgs(json.join(' '));
        if (!parsed.ok) {
          this.write(chalk.red(parsed.error));
          return true;
        }
        await this.withAbort(signal => runTool(this.runtime, toolName, parsed.value, this.writer, signal));
        return true;
      }

      default:
        this.write(chalk.yellow(`Unknown command ${command}. Type /help for commands.`));
        return true;
    }
  }

  private async withAbort<T>(fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    this.inFlight = controller;
    try {
      return await fn(controller.signal);
    } finally {
      this.inFlight = null;
    }
  }

  private readonly writer: Write = text => this.write(text);

  private write(text: string): void {
    this.output.write(`${text}\n`);
  }
}
