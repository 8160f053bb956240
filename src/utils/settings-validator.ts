/**
 * Hook Settings Validator
 *
 * Validates and auto-fixes the "hooks" section of a loco config.json or
 * .claude/settings.json before it is handed to the hook runner.
 *
 * @purpose Validate and repair hook configuration files
 */

import { HOOK_EVENTS } from '../types/hooks.js';

export interface ValidationError {
  hook: string;
  index: number;
  error: string;
  fix?: string;
}

export interface HookCommand {
  type: 'command';
  command: string;
  timeout?: number;
}

export interface HookEntry {
  matcher?: string;
  hooks: Array<HookCommand | string>;
}

export interface SettingsSchema {
  hooks: {
    [hookName: string]: Array<HookEntry | string>;
  };
  [key: string]: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKnownEvent(name: string): boolean {
  return HOOK_EVENTS.some((event) => event === name);
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(`^(?:${pattern})`, 'i');
    return true;
  } catch {
    return false;
  }
}

function validateCommand(cmd: unknown, hookName: string, index: number, cmdIndex: number): ValidationError[] {
  if (typeof cmd === 'string') {
    return cmd.trim()
      ? []
      : [{ hook: hookName, index, error: `Hook command ${cmdIndex} is an empty string` }];
  }

  if (!isRecord(cmd)) {
    return [{ hook: hookName, index, error: `Hook command ${cmdIndex} must be a string or an object` }];
  }

  const errors: ValidationError[] = [];

  if (!cmd.type) {
    errors.push({
      hook: hookName,
      index,
      error: `Hook command ${cmdIndex} missing "type" field`,
      fix: 'Add "type": "command"',
    });
  } else if (cmd.type !== 'command') {
    errors.push({
      hook: hookName,
      index,
      error: `Hook command ${cmdIndex} has unsupported type "${String(cmd.type)}"`,
      fix: 'Only "command" hooks are run',
    });
  }

  if (typeof cmd.command !== 'string' || !cmd.command.trim()) {
    errors.push({
      hook: hookName,
      index,
      error: `Hook command ${cmdIndex} missing "command" field`,
    });
  }

  if (cmd.timeout !== undefined && (typeof cmd.timeout !== 'number' || cmd.timeout <= 0)) {
    errors.push({
      hook: hookName,
      index,
      error: `Hook command ${cmdIndex} has invalid "timeout" (expected seconds > 0)`,
      fix: 'Remove "timeout" to use the 60 second default',
    });
  }

  return errors;
}

/**
 * Validates a settings object's hook configuration
 *
 * Checks for:
 * 1. A "hooks" object at the top level
 * 2. Unknown event names (only PreToolUse, PostToolUse, SessionStart, SessionEnd run)
 * 3. Flat object format instead of array
 * 4. Matchers that are not strings or do not compile as regular expressions
 * 5. Required hook command fields and positive timeouts
 *
 * @returns Array of validation errors (empty if valid)
 */
export function validateSettings(settings: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (!isRecord(settings)) {
    errors.push({
      hook: 'root',
      index: 0,
      error: 'Settings must be an object',
    });
    return errors;
  }

  const hooks = settings.hooks;
  if (!isRecord(hooks)) {
    errors.push({
      hook: 'root',
      index: 0,
      error: 'Settings must have a "hooks" object',
    });
    return errors;
  }

  for (const [hookName, hookValue] of Object.entries(hooks)) {
    if (!isKnownEvent(hookName)) {
      errors.push({
        hook: hookName,
        index: 0,
        error: `Unknown hook event "${hookName}"`,
        fix: `Use one of: ${HOOK_EVENTS.join(', ')}`,
      });
    }

    if (!Array.isArray(hookValue)) {
      errors.push({
        hook: hookName,
        index: 0,
        error: `Hook value must be an array, got ${typeof hookValue}`,
        fix: 'Wrap in array with {matcher, hooks} structure',
      });
      continue;
    }

    hookValue.forEach((entry: unknown, index: number) => {
      // Bare command strings are shorthand for an unmatched hook
      if (typeof entry === 'string') {
        errors.push(...validateCommand(entry, hookName, index, 0));
        return;
      }

      if (!isRecord(entry)) {
        errors.push({
          hook: hookName,
          index,
          error: 'Hook entry must be a command string or an object',
        });
        return;
      }

      if ('matcher' in entry) {
        if (typeof entry.matcher !== 'string') {
          errors.push({
            hook: hookName,
            index,
            error: 'Hook entry "matcher" must be a string',
          });
        } else if (!isValidPattern(entry.matcher)) {
          errors.push({
            hook: hookName,
            index,
            error: `Hook entry matcher "${entry.matcher}" is not a valid regular expression`,
            fix: 'Escape special characters; invalid patterns only match the exact tool name',
          });
        }
      }

      if (!Array.isArray(entry.hooks)) {
        errors.push({
          hook: hookName,
          index,
          error: 'Hook entry missing required "hooks" array',
        });
        return;
      }

      entry.hooks.forEach((cmd: unknown, cmdIndex: number) => {
        errors.push(...validateCommand(cmd, hookName, index, cmdIndex));
      });
    });
  }

  return errors;
}

function fixCommand(cmd: unknown): HookCommand | string | null {
  if (typeof cmd === 'string') {
    return cmd.trim() ? cmd : null;
  }
  if (!isRecord(cmd) || typeof cmd.command !== 'string' || !cmd.command.trim()) {
    return null;
  }
  const fixed: HookCommand = { type: 'command', command: cmd.command };
  if (typeof cmd.timeout === 'number' && cmd.timeout > 0) {
    fixed.timeout = cmd.timeout;
  }
  return fixed;
}

/**
 * Auto-fixes common hook schema violations
 *
 * Fixes:
 * 1. Converts flat objects to proper array format
 * 2. Drops unknown hook events
 * 3. Adds missing "type": "command" and drops commands without a command string
 * 4. Removes invalid timeouts and non-string matchers
 * 5. Preserves all other top-level settings
 */
export function fixSettings(settings: unknown): SettingsSchema {
  if (!isRecord(settings)) {
    return { hooks: {} };
  }

  const fixedHooks: SettingsSchema['hooks'] = {};
  const hooks = isRecord(settings.hooks) ? settings.hooks : {};

  for (const [hookName, hookValue] of Object.entries(hooks)) {
    if (!isKnownEvent(hookName)) {
      continue;
    }

    const hookArray: unknown[] = Array.isArray(hookValue) ? [...hookValue] : [hookValue];

    const fixedEntries: Array<HookEntry | string> = [];
    for (const entry of hookArray) {
      if (typeof entry === 'string') {
        if (entry.trim()) fixedEntries.push(entry);
        continue;
      }
      if (!isRecord(entry) || !Array.isArray(entry.hooks)) {
        continue;
      }

      const fixedEntry: HookEntry = { hooks: [] };
      if (typeof entry.matcher === 'string') {
        fixedEntry.matcher = entry.matcher;
      }
      for (const cmd of entry.hooks) {
        const fixed = fixCommand(cmd);
        if (fixed !== null) fixedEntry.hooks.push(fixed);
      }
      fixedEntries.push(fixedEntry);
    }

    fixedHooks[hookName] = fixedEntries;
  }

  return { ...settings, hooks: fixedHooks };
}

/**
 * Validates and returns a detailed report
 *
 * @returns Human-readable validation report
 */
export function getValidationReport(settings: unknown): string {
  const errors = validateSettings(settings);

  if (errors.length === 0) {
    return '✓ Settings are valid';
  }

  const lines = ['⚠️  Settings validation errors found:\n'];

  for (const [hook, hookErrors] of Object.entries(groupByHook(errors))) {
    lines.push(`  ${hook}:`);
    hookErrors.forEach(err => {
      lines.push(`    - ${err.error}`);
      if (err.fix) {
        lines.push(`      Fix: ${err.fix}`);
      }
    });
    lines.push('');
  }

  return lines.join('\n');
}

export function groupByHook(errors: ValidationError[]): Record<string, ValidationError[]> {
  return errors.reduce<Record<string, ValidationError[]>>((acc, err) => {
    if (!acc[err.hook]) {
      acc[err.hook] = [];
    }
    acc[err.hook].push(err);
    return acc;
  }, {});
}

/**
 * Quick check if settings are valid
 */
export function isValid(settings: unknown): boolean {
  return validateSettings(settings).length === 0;
}
