/**
 * CLI program.
 */
import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCheckCommand } from './commands/check.js';
import { createDescribeCommand } from './commands/describe.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('doctag')
    .description('Tag-driven validation and transformation of document records')
    .version(readVersion());
  [createCheckCommand, createDescribeCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
