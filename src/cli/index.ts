import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createFolderCommand } from './commands/folder.js';
import { createPlaybookCommand } from './commands/playbook.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('playbook-grapher')
    .description('Diagram Ansible playbook includes and role dependencies')
    .version(VERSION);
  [createPlaybookCommand, createFolderCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
