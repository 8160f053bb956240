/**
 * Lifecycle Hook Types
 */

export const HOOK_EVENTS = ["PreToolUse", "PostToolUse", "SessionStart", "SessionEnd"] as const

export type HookEvent = (typeof HOOK_EVENTS)[number]

export type HookDecision = "allow" | "deny" | "skip"

export interface Hook {
  command: string
  timeout: number // seconds
  matcher: string | null // regex against the tool name
}

export type HookConfig = Record<HookEvent, Hook[]>

export interface HookContext {
  toolName?: string
  toolInput?: Record<string, unknown>
  toolOutput?: string
  cwd?: string
}

export interface HookResult {
  success: boolean
  exitCode: number
  stdout: string
  stderr: string
  // Parsed from JSON stdout on exit 0
  decision: HookDecision | null
  reason: string | null
  modifiedInput: Record<string, unknown> | null
  additionalContext: string | null
}

export interface PreToolCheck {
  allowed: boolean
  reason: string | null
  modifiedInput: Record<string, unknown> | null
}

export interface CommandOutcome {
  exitCode: number
  stdout: string
  stderr: string
  timedOut: boolean
}

export interface CommandRequest {
  input: string
  cwd: string
  env: NodeJS.ProcessEnv
  timeoutMs: number
}

export type HookRunner = (command: string, request: CommandRequest) => Promise<CommandOutcome>
