export { Repl, type ReplOptions } from './repl.js';
export {
  COMMANDS,
  EXIT_FAILED,
  EXIT_OK,
  isCommand,
  parseToolArgs,
  runCommand,
  runTool,
  type CommandName,
  type Write
} from './commands.js';
export { formatStatus, formatToolList, formatToolResult, formatTurnResult } from './output.js';
