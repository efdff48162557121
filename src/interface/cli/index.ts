/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions } from './utils/global-options.js';
import { pathsCommand } from './commands/paths.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('deppaths')
    .description('List the dependency paths between groups of graph nodes')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);

  program.addCommand(pathsCommand());
  program.addCommand(versionCommand());

  return program;
}
