/**
 * Terminal formatting for turn and tool results
 */

import chalk from 'chalk';
import type { AgentTurnResult } from '../executor/index.js';
import type { ToolResult, ToolSpec } from '../tools/index.js';

export function formatTurnResult(result: AgentTurnResult): string {
  const lines: string[] = [];

  if (result.invokedTool) {
    const status = result.toolResult ? ` ${formatStatus(result.toolResult.status)}` : '';
    lines.push(chalk.gray(`↳ ${result.invokedTool.toolName} ${JSON.stringify(result.invokedTool.args)}`) + status);
  }

  switch (result.status) {
    case 'done':
      lines.push(result.finalText);
      break;
    case 'error':
      lines.push(chalk.red(result.finalText));
      if (result.error) {
        lines.push(chalk.gray(`  [${result.error.code}] ${result.error.message}`));
      }
      break;
    case 'cancelled':
      lines.push(chalk.yellow(result.finalText));
      break;
  }

  return lines.join('\n');
}

export function formatStatus(status: ToolResult['status']): string {
  switch (status) {
    case 'ok':
      return chalk.green(status);
    case 'not_found':
      return chalk.yellow(status);
    case 'adapter_error':
      return chalk.red(status);
  }
}

export function formatToolResult(result: ToolResult): string {
  const header = `${chalk.bold(result.toolName)} ${formatStatus(result.status)}`;
  if (result.status === 'ok') {
    return `${header}\n${JSON.stringify(result.payload, null, 2)}`;
  }
  return result.rawError ? `${header}: ${result.rawError}` : header;
}

export function formatToolList(specs: readonly ToolSpec[]): string {
  return specs
    .map(spec => {
      const args = Object.entries(spec.arguments)
        .map(([key, arg]) => `${key}${arg.required ? '' : '?'}: ${arg.type}`)
        .join(', ');
      const scopes = spec.access ? chalk.gray(`  [${spec.access.scopes.join(', ')}]`) : '';
      return `${chalk.cyan(spec.name)}(${args})  ${spec.description}${scopes}`;
    })
    .join('\n');
}
