/**
 * Lifecycle Hooks
 *
 * Shell commands run at PreToolUse, PostToolUse, SessionStart and SessionEnd.
 * A hook receives a JSON payload on stdin and may answer with JSON on stdout.
 * Exit codes: 0 success, 2 blocking error (stderr shown), anything else non-blocking.
 *
 * @purpose Parse hook configuration, match hooks to tools, and run them
 */

import { spawn } from "child_process"
import type { ChildProcess } from "child_process"
import { HOOK_EVENTS } from "../types/hooks.js"
import type {
  CommandOutcome,
  CommandRequest,
  Hook,
  HookConfig,
  HookContext,
  HookDecision,
  HookEvent,
  HookResult,
  HookRunner,
  PreToolCheck,
} from "../types/hooks.js"

export const DEFAULT_HOOK_TIMEOUT = 60
export const BLOCKING_EXIT_CODE = 2

const DECISIONS: readonly HookDecision[] = ["allow", "deny", "skip"]

type HookOutput = Pick<HookResult, "decision" | "reason" | "modifiedInput" | "additionalContext">

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isHookEvent(value: string): value is HookEvent {
  return HOOK_EVENTS.some((event) => event === value)
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function emptyHookConfig(): HookConfig {
  return { PreToolUse: [], PostToolUse: [], SessionStart: [], SessionEnd: [] }
}

function toHook(value: unknown, matcher: string | null): Hook | null {
  if (typeof value === "string") {
    return value.trim() ? { command: value, timeout: DEFAULT_HOOK_TIMEOUT, matcher } : null
  }
  if (!isRecord(value) || value.type !== "command" || typeof value.command !== "string" || !value.command.trim()) {
    return null
  }
  const timeout = typeof value.timeout === "number" && value.timeout > 0 ? value.timeout : DEFAULT_HOOK_TIMEOUT
  return { command: value.command, timeout, matcher }
}

/**
 * Build a HookConfig from the "hooks" section of a config file.
 *
 * Each event maps to a list whose items are either a bare command string or
 * `{ matcher?, hooks: [...] }`. Unknown events and non-command hooks are ignored.
 */
export function parseHookConfig(data: unknown): HookConfig {
  const config = emptyHookConfig()
  if (!isRecord(data)) return config

  for (const [eventName, entries] of Object.entries(data)) {
    if (!isHookEvent(eventName) || !Array.isArray(entries)) continue

    const hooks: Hook[] = []
    for (const entry of entries) {
      if (typeof entry === "string") {
        const hook = toHook(entry, null)
        if (hook) hooks.push(hook)
        continue
      }
      if (!isRecord(entry) || !Array.isArray(entry.hooks)) continue

      const matcher = typeof entry.matcher === "string" ? entry.matcher : null
      for (const item of entry.hooks) {
        const hook = toHook(item, matcher)
        if (hook) hooks.push(hook)
      }
    }
    config[eventName] = hooks
  }

  return config
}

/**
 * Matchers are case-insensitive regexes anchored at the start of the tool name.
 * A matcher that is not a valid regex is compared literally.
 */
export function hookMatches(hook: Hook, toolName: string): boolean {
  if (hook.matcher === null) return true

  let pattern: RegExp
  try {
    pattern = new RegExp(`^(?:${hook.matcher})`, "i")
  } catch {
    return hook.matcher.toLowerCase() === toolName.toLowerCase()
  }
  return pattern.test(toolName)
}

export function getHooks(config: HookConfig, event: HookEvent, toolName?: string): Hook[] {
  const hooks = config[event]
  if (toolName === undefined) return [...hooks]
  return hooks.filter((hook) => hookMatches(hook, toolName))
}

export function parseHookOutput(stdout: string): HookOutput {
  const output: HookOutput = { decision: null, reason: null, modifiedInput: null, additionalContext: null }
  if (!stdout.trim()) return output

  let parsed: unknown
  try {
    parsed = JSON.parse(stdout)
  } catch {
    // Plain-text stdout carries no decision
    return output
  }
  if (!isRecord(parsed)) return output

  const decision = parsed.decision
  if (typeof decision === "string") {
    output.decision = DECISIONS.find((known) => known === decision) ?? null
  }
  if (typeof parsed.reason === "string") output.reason = parsed.reason
  if (isRecord(parsed.modified_input)) output.modifiedInput = parsed.modified_input
  if (typeof parsed.additional_context === "string") output.additionalContext = parsed.additional_context

  return output
}

function killProcessTree(child: ChildProcess, grouped: boolean): void {
  if (grouped && child.pid !== undefined) {
    try {
      process.kill(-child.pid, "SIGKILL")
      return
    } catch {
      // Group already gone; fall through to the shell itself
    }
  }
  child.kill("SIGKILL")
}

/**
 * Default runner: the command goes through the platform shell with the
 * payload on stdin. On POSIX the shell leads its own process group so a
 * timeout kills everything it started, and the promise settles from the
 * timer with whatever output arrived so far.
 */
export function runShellCommand(command: string, request: CommandRequest): Promise<CommandOutcome> {
  return new Promise((resolve) => {
    const grouped = process.platform !== "win32"
    const child = spawn(command, {
      shell: true,
      cwd: request.cwd,
      env: request.env,
      stdio: ["pipe", "pipe", "pipe"],
      detached: grouped,
    })

    let stdout = ""
    let stderr = ""
    let settled = false

    const finish = (outcome: CommandOutcome): void => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      resolve(outcome)
    }

    const timer = setTimeout(() => {
      killProcessTree(child, grouped)
      child.stdin.destroy()
      child.stdout.destroy()
      child.stderr.destroy()
      finish({ exitCode: -1, stdout, stderr, timedOut: true })
    }, request.timeoutMs)

    child.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString()
    })
    child.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString()
    })
    // Hooks that never read stdin close the pipe early
    child.stdin.on("error", (err) => {
      if (!err.message.includes("EPIPE")) {
        stderr += err.message
      }
    })

    child.on("error", (err) => {
      finish({ exitCode: -1, stdout, stderr: stderr || err.message, timedOut: false })
    })
    child.on("close", (code) => {
      finish({ exitCode: code ?? -1, stdout, stderr, timedOut: false })
    })

    child.stdin.end(request.input)
  })
}

function failedResult(stderr: string): HookResult {
  return {
    success: false,
    exitCode: -1,
    stdout: "",
    stderr,
    decision: null,
    reason: null,
    modifiedInput: null,
    additionalContext: null,
  }
}

export async function executeHook(
  hook: Hook,
  event: HookEvent,
  context: HookContext = {},
  runner: HookRunner = runShellCommand
): Promise<HookResult> {
  const cwd = context.cwd ?? process.cwd()

  const payload: Record<string, unknown> = { hook_event: event, cwd }
  if (context.toolName) payload.tool_name = context.toolName
  if (context.toolInput && Object.keys(context.toolInput).length > 0) payload.tool_input = context.toolInput
  if (context.toolOutput) payload.tool_output = context.toolOutput

  let outcome: CommandOutcome
  try {
    outcome = await runner(hook.command, {
      input: JSON.stringify(payload),
      cwd,
      env: { ...process.env, LOCO_PROJECT_DIR: cwd },
      timeoutMs: hook.timeout * 1000,
    })
  } catch (err) {
    return failedResult(errorMessage(err))
  }

  if (outcome.timedOut) {
    return failedResult(`Hook timed out after ${hook.timeout} seconds`)
  }

  const result: HookResult = {
    success: outcome.exitCode === 0,
    exitCode: outcome.exitCode,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    decision: null,
    reason: null,
    modifiedInput: null,
    additionalContext: null,
  }

  if (outcome.exitCode === 0) {
    Object.assign(result, parseHookOutput(outcome.stdout))
  }

  return result
}

/**
 * Run hooks one after another. A deny does not stop later hooks from running.
 */
export async function executeHooks(
  hooks: Hook[],
  event: HookEvent,
  context: HookContext = {},
  runner: HookRunner = runShellCommand
): Promise<HookResult[]> {
  const results: HookResult[] = []
  for (const hook of hooks) {
    results.push(await executeHook(hook, event, context, runner))
  }
  return results
}

export interface HookRunOptions {
  cwd?: string
  runner?: HookRunner
}

export async function checkPreToolHooks(
  hooks: Hook[],
  toolName: string,
  toolInput: Record<string, unknown>,
  options: HookRunOptions = {}
): Promise<PreToolCheck> {
  const results = await executeHooks(hooks, "PreToolUse", { toolName, toolInput, cwd: options.cwd }, options.runner)

  let modifiedInput: Record<string, unknown> | null = null

  for (const result of results) {
    if (result.decision === "deny") {
      return { allowed: false, reason: result.reason || result.stderr.trim() || "Hook denied execution", modifiedInput: null }
    }
    if (result.exitCode === BLOCKING_EXIT_CODE) {
      return { allowed: false, reason: result.stderr.trim() || "Hook blocked execution", modifiedInput: null }
    }
    // Last modification wins
    if (result.modifiedInput) {
      modifiedInput = result.modifiedInput
    }
  }

  return { allowed: true, reason: null, modifiedInput }
}

/**
 * Run PostToolUse hooks and collect context to append to the tool result
 */
export async function runPostToolHooks(
  hooks: Hook[],
  toolName: string,
  toolInput: Record<string, unknown>,
  toolOutput: string,
  options: HookRunOptions = {}
): Promise<string | null> {
  const results = await executeHooks(
    hooks,
    "PostToolUse",
    { toolName, toolInput, toolOutput, cwd: options.cwd },
    options.runner
  )

  const parts: string[] = []
  for (const result of results) {
    if (result.additionalContext) {
      parts.push(result.additionalContext)
    } else if (!result.success && result.stderr.trim()) {
      parts.push(`[Hook warning: ${result.stderr.trim()}]`)
    }
  }

  return parts.length > 0 ? parts.join("\n") : null
}
