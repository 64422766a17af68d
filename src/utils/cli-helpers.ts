/**
 * Shared CLI helpers for command handlers
 */

import * as readline from 'readline';
import { InvalidArgumentError } from 'commander';

/**
 * Interactive y/N confirmation. Default is N.
 * Throws if stdin is not a TTY (pipe, CI) -- use --force to skip in those environments.
 */
export async function confirmAction(message: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    throw new Error('Interactive confirmation required. Use --force to skip confirmation in non-interactive environments.');
  }
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(`${message} (y/N): `, (answer) => {
      rl.close();
      const normalized = answer.trim().toLowerCase();
      resolve(normalized === 'y' || normalized === 'yes');
    });
  });
}

/**
 * Parse an integer CLI option value (commander argParser).
 */
export function parseIntegerOption(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return Number(value);
}
