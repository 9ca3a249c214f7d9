/**
 * @declsort/cli - command-line front end
 */

import { Command } from 'commander';
import { DECLSORT_VERSION } from '@declsort/core';
import { checkCommand, formatCommand } from './commands/format.js';

export { runFormat, statusLine, summaryLine, consoleOutput } from './commands/format.js';
export type { CommandOutput, FormatCommandOptions, FormatSummary } from './commands/format.js';
export { exitWithError } from './utils/errorFormatter.js';

export function createProgram(): Command {
  return new Command()
    .name('declsort')
    .description('Comment-preserving declaration sorter for TypeScript and JavaScript')
    .version(DECLSORT_VERSION)
    .addCommand(formatCommand)
    .addCommand(checkCommand);
}
