// Command-line program definition

import { Command } from 'commander';
import { validateCommand } from './commands/validate.js';
import { repairCommand } from './commands/repair.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('fixity')
    .description('Audit and repair datastream checksums in a Fedora repository')
    .version('0.1.0');

  program.addCommand(validateCommand);
  program.addCommand(repairCommand);

  return program;
}
