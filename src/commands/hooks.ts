/**
 * loco hooks - Inspect and dry-run lifecycle hooks
 *
 * Hooks come from the layered config files (global config.json,
 * .claude/settings.json, .loco/config.json); the highest layer that
 * configures an event supplies that event's hooks.
 *
 * @purpose CLI command to list configured hooks and run PreToolUse checks
 */

import chalk from "chalk"
import { checkPreToolHooks, getHooks } from "../lib/hooks.js"
import { loadConfigLayers, loadHookConfig, resolveRoots } from "../utils/loco-config.js"
import { HOOK_EVENTS } from "../types/hooks.js"
import type { RootOptions } from "./skills.js"

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function listHooks(options: RootOptions): void {
  const roots = resolveRoots(options)
  const config = loadHookConfig(roots)

  console.log(chalk.bold("\n  Lifecycle Hooks\n"))

  for (const layer of loadConfigLayers(roots)) {
    const configured = isRecord(layer.settings.hooks) ? Object.keys(layer.settings.hooks).length : 0
    const label = configured > 0 ? chalk.green(`${configured} event(s)`) : chalk.gray("none")
    console.log(chalk.gray(`  ${layer.layer.padEnd(7)} ${layer.path} `) + label)
  }
  console.log()

  let total = 0
  for (const eventName of HOOK_EVENTS) {
    const hooks = config[eventName]
    if (hooks.length === 0) continue

    console.log(chalk.bold(`  ${eventName}`))
    for (const hook of hooks) {
      const matcher = hook.matcher === null ? chalk.gray("*") : chalk.cyan(hook.matcher)
      console.log(`    ${matcher} ${chalk.white(hook.command)} ${chalk.gray(`(${hook.timeout}s)`)}`)
      total++
    }
  }

  if (total === 0) {
    console.log(chalk.yellow("  No hooks configured."))
  }
  console.log()
}

async function checkTool(toolName: string | undefined, options: RootOptions & { input?: string }): Promise<void> {
  if (!toolName) {
    console.log(chalk.yellow("\n  Usage: loco hooks check <tool> [--input <json>]\n"))
    process.exitCode = 1
    return
  }

  let toolInput: Record<string, unknown> = {}
  if (options.input) {
    let parsed: unknown
    try {
      parsed = JSON.parse(options.input)
    } catch (error) {
      console.error(chalk.red(`\n  --input is not valid JSON: ${error instanceof Error ? error.message : String(error)}\n`))
      process.exitCode = 1
      return
    }
    if (!isRecord(parsed)) {
      console.error(chalk.red("\n  --input must be a JSON object\n"))
      process.exitCode = 1
      return
    }
    toolInput = parsed
  }

  const roots = resolveRoots(options)
  const hooks = getHooks(loadHookConfig(roots), "PreToolUse", toolName)

  if (hooks.length === 0) {
    console.log(chalk.gray(`\n  No PreToolUse hooks match "${toolName}".\n`))
    return
  }

  const result = await checkPreToolHooks(hooks, toolName, toolInput, { cwd: roots.projectRoot })

  if (result.allowed) {
    console.log(chalk.green(`\n  ✓ ${toolName} allowed by ${hooks.length} hook(s)`))
    if (result.modifiedInput) {
      console.log(chalk.gray(`  Modified input: ${JSON.stringify(result.modifiedInput)}`))
    }
  } else {
    console.log(chalk.red(`\n  ✗ ${toolName} blocked: ${result.reason}`))
    process.exitCode = 2
  }
  console.log()
}

export async function hooksCommand(
  action?: string,
  toolName?: string,
  options: RootOptions & { input?: string } = {}
): Promise<void> {
  switch (action) {
    case "list":
    case undefined:
      listHooks(options)
      break
    case "check":
      await checkTool(toolName, options)
      break
    default:
      console.log(chalk.bold("\n  loco hooks - Lifecycle hooks\n"))
      console.log(chalk.gray("  Commands:"))
      console.log("    loco hooks list                 Show hooks from every config layer")
      console.log("    loco hooks check <tool>         Run PreToolUse hooks for a tool")
      console.log()
      process.exitCode = 1
  }
}
