/**
 * One-shot subcommands
 *
 * Each command writes its output through `write` and returns the process
 * exit code: 0 on success, 2 when the turn or tool call did not succeed.
 */

import chalk from 'chalk';
import type { Runtime } from '../core/index.js';
import { isSwitchboardError } from '../types/errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { formatToolList, formatToolResult, formatTurnResult } from './output.js';

export type Write = (text: string) => void;

export const EXIT_OK = 0;
export const EXIT_FAILED = 2;

export const ONE_SHOT_SESSION = 'cli';

export const COMMANDS = ['ask', 'tool', 'post', 'comments', 'tools'] as const;
export type CommandName = (typeof COMMANDS)[number];

export function isCommand(name: string): name is CommandName {
  return COMMANDS.some(command => command === name);
}

export type ParsedArgs =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; error: string };

/**
 * Parse the JSON argument object of `tool <name> <json>` and `/tool`.
 */
export function parseToolArgs(text: string | undefined): ParsedArgs {
  if (text === undefined || text.trim() === '') {
    return { ok: true, value: {} };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, error: `Tool arguments are not valid JSON: ${text}` };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: 'Tool arguments must be a JSON object' };
  }
  return { ok: true, value: Object.fromEntries(Object.entries(parsed)) };
}

/**
 * Call a tool directly and print its result.
 */
export async function runTool(
  runtime: Runtime,
  toolName: string,
  args: Record<string, unknown>,
  write: Write,
  signal?: AbortSignal
): Promise<number> {
  try {
    const result = await runtime.agent.invokeTool(toolName, args, { signal });
    write(formatToolResult(result));
    return result.status === 'ok' ? EXIT_OK : EXIT_FAILED;
  } catch (error) {
    if (!isSwitchboardError(error)) throw error;
    write(chalk.red(`[${error.code}] ${getErrorMessage(error)}`));
    return EXIT_FAILED;
  }
}

export async function runCommand(
  command: CommandName,
  args: string[],
  runtime: Runtime,
  write: Write
): Promise<number> {
  switch (command) {
    case 'ask': {
      const query = args.join(' ').trim();
      if (!query) {
        write(chalk.red('Usage: switchboard ask <query>'));
        return EXIT_FAILED;
      }
      const result = await runtime.agent.handleTurn(ONE_SHOT_SESSION, query);
      write(formatTurnResult(result));
      return result.status === 'done' ? EXIT_OK : EXIT_FAILED;
    }

    case 'tool': {
      const [toolName, ...rest] = args;
      if (!toolName) {
        write(chalk.red('Usage: switchboard tool <name> <json-args>'));
        return EXIT_FAILED;
      }
      const parsed = parseToolArgs(rest.join(' '));
      if (!parsed.ok) {
        write(chalk.red(parsed.error));
        return EXIT_FAILED;
      }
      return runTool(runtime, toolName, parsed.value, write);
    }

    case 'post':
    case 'comments': {
      const [id] = args;
      if (id === undefined) {
        write(chalk.red(`Usage: switchboard ${command} <post-id>`));
        return EXIT_FAILED;
      }
      // Text goes through the same reference rules as model output, so "2" and "#2" both work.
      return runTool(runtime, `${command}_call`, { post_id: id }, write);
    }

    case 'tools':
      write(formatToolList(runtime.agent.listTools()));
      return EXIT_OK;
  }
}
