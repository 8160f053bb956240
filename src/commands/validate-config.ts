/**
 * Validate and repair hook configuration
 *
 * @purpose CLI command to validate and repair .loco/config.json (or any layered config file)
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { Command } from 'commander';
import { validateSettings, fixSettings, groupByHook } from '../utils/settings-validator.js';
import { resolveRoots } from '../utils/loco-config.js';
import { getProjectLocoFile } from '../utils/loco-paths.js';
import type { RootOptions } from './skills.js';

export type ValidateConfigOptions = RootOptions & {
  file?: string;
  fix?: boolean;
  json?: boolean;
};

function report(json: boolean | undefined, payload: Record<string, unknown>, lines: () => void): void {
  if (json) {
    console.log(JSON.stringify(payload, null, 2));
  } else {
    lines();
  }
}

/**
 * Validate a config file's "hooks" section
 *
 * Usage: loco [-p <dir>] validate-config [--file <path>] [--fix] [--json]
 *
 * Without --file, checks .loco/config.json under the resolved project root.
 * Exit 0 when valid (or fully fixed), 1 otherwise.
 * --fix writes a `.backup` copy before rewriting the file.
 */
export function validateConfigCommand(options: ValidateConfigOptions = {}): void {
  const configPath = options.file
    ? path.resolve(options.file)
    : getProjectLocoFile(resolveRoots(options).projectRoot, 'config.json');

  if (!fs.existsSync(configPath)) {
    report(options.json, { valid: false, error: 'config file not found', path: configPath }, () => {
      console.error(chalk.red('Error: config file not found'));
      console.error(chalk.gray(`Expected at: ${configPath}`));
    });
    process.exit(1);
  }

  let settings: unknown;
  try {
    settings = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    report(options.json, { valid: false, error: 'Failed to parse config file', details, path: configPath }, () => {
      console.error(chalk.red(`Error: Failed to parse ${configPath}`));
      console.error(chalk.gray(details));
    });
    process.exit(1);
  }

  const errors = validateSettings(settings);

  if (errors.length === 0) {
    report(options.json, { valid: true, path: configPath }, () => {
      console.log(chalk.green('✓ Hook configuration is valid'));
      console.log(chalk.gray(`File: ${configPath}`));
    });
    process.exit(0);
  }

  report(options.json, { valid: false, errors, path: configPath, fixable: options.fix }, () => {
    console.error(chalk.red('✗ Hook configuration validation failed\n'));
    for (const [hook, hookErrors] of Object.entries(groupByHook(errors))) {
      console.error(chalk.yellow(`  ${hook}:`));
      hookErrors.forEach(err => {
        console.error(chalk.gray(`    • ${err.error}`));
        if (err.fix) {
          console.error(chalk.cyan(`      Fix: ${err.fix}`));
        }
      });
      console.error('');
    }
  });

  if (!options.fix) {
    if (!options.json) {
      console.log(chalk.cyan('Run with --fix to attempt auto-repair'));
    }
    process.exit(1);
  }

  if (!options.json) {
    console.log(chalk.blue('Attempting auto-fix...\n'));
  }

  const fixed = fixSettings(settings);
  const backupPath = `${configPath}.backup`;
  try {
    fs.copyFileSync(configPath, backupPath);
    fs.writeFileSync(configPath, JSON.stringify(fixed, null, 2) + '\n');
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    report(options.json, { fixed: false, error: 'Auto-fix failed', details }, () => {
      console.error(chalk.red('Error during auto-fix:'));
      console.error(chalk.gray(details));
    });
    process.exit(1);
  }

  const remaining = validateSettings(fixed);
  if (remaining.length === 0) {
    report(options.json, { fixed: true, path: configPath, backup: backupPath }, () => {
      console.log(chalk.green('✓ Hook configuration auto-fixed'));
      console.log(chalk.gray(`  Fixed: ${configPath}`));
      console.log(chalk.gray(`  Backup: ${backupPath}`));
      console.log('');
      console.log(chalk.yellow('Please review the changes before committing.'));
    });
    process.exit(0);
  }

  report(options.json, { fixed: 'partial', remainingErrors: remaining, path: configPath, backup: backupPath }, () => {
    console.log(chalk.yellow('⚠  Auto-fix applied but some issues remain:\n'));
    remaining.forEach(err => {
      console.log(chalk.gray(`  • ${err.hook}: ${err.error}`));
    });
    console.log('');
    console.log(chalk.gray('Manual fixes required for remaining issues.'));
  });
  process.exit(1);
}

/**
 * Register the validate-config command with Commander
 */
export function registerValidateConfigCommand(program: Command): void {
  program
    .command('validate-config')
    .description('Validate and repair the hooks section of .loco/config.json')
    .option('-f, --file <path>', 'Config file to check (default: .loco/config.json)')
    .option('--fix', 'Attempt to auto-repair common issues')
    .option('--json', 'Output in JSON format')
    .action((_options: ValidateConfigOptions, command: Command) => {
      validateConfigCommand(command.optsWithGlobals<ValidateConfigOptions>());
    });
}
