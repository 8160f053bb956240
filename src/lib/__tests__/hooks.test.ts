import * as os from "os"
import {
  checkPreToolHooks,
  executeHook,
  getHooks,
  hookMatches,
  parseHookConfig,
  parseHookOutput,
  runPostToolHooks,
  runShellCommand,
} from "../hooks.js"
import type { CommandOutcome, CommandRequest, Hook } from "../../types/hooks.js"

function outcome(partial: Partial<CommandOutcome> = {}): CommandOutcome {
  return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...partial }
}

function fakeRunner(outcomes: Record<string, CommandOutcome>) {
  return jest.fn(async (command: string, _request: CommandRequest): Promise<CommandOutcome> => {
    return outcomes[command] ?? outcome()
  })
}

function hook(command: string, matcher: string | null = null, timeout = 60): Hook {
  return { command, matcher, timeout }
}

describe("parseHookConfig", () => {
  it("reads matcher entries, bare strings and ignores unknown events", () => {
    const config = parseHookConfig({
      PreToolUse: [
        {
          matcher: "bash",
          hooks: [
            { type: "command", command: "./block.sh", timeout: 5 },
            "echo hi",
            { type: "http", url: "http://localhost/hooks" },
          ],
        },
      ],
      SessionStart: ["./start.sh"],
      Stop: ["./never.sh"],
    })

    expect(config).toEqual({
      PreToolUse: [
        { command: "./block.sh", timeout: 5, matcher: "bash" },
        { command: "echo hi", timeout: 60, matcher: "bash" },
      ],
      PostToolUse: [],
      SessionStart: [{ command: "./start.sh", timeout: 60, matcher: null }],
      SessionEnd: [],
    })
  })

  it("falls back to the default timeout for invalid values", () => {
    const config = parseHookConfig({
      PostToolUse: [{ hooks: [{ type: "command", command: "fmt", timeout: -1 }] }],
    })

    expect(config.PostToolUse).toEqual([{ command: "fmt", timeout: 60, matcher: null }])
  })

  it("returns an empty config for non-object input", () => {
    expect(parseHookConfig(null).PreToolUse).toEqual([])
    expect(parseHookConfig(["x"]).SessionEnd).toEqual([])
  })
})

describe("hookMatches", () => {
  it("matches every tool without a matcher", () => {
    expect(hookMatches(hook("x"), "anything")).toBe(true)
  })

  it("anchors the pattern at the start and ignores case", () => {
    expect(hookMatches(hook("x", "bash"), "Bash")).toBe(true)
    expect(hookMatches(hook("x", "bash"), "bash_exec")).toBe(true)
    expect(hookMatches(hook("x", "bash"), "mybash")).toBe(false)
    expect(hookMatches(hook("x", "write|edit"), "Edit")).toBe(true)
  })

  it("compares invalid patterns literally", () => {
    expect(hookMatches(hook("x", "["), "[")).toBe(true)
    expect(hookMatches(hook("x", "["), "read")).toBe(false)
  })
})

describe("getHooks", () => {
  const config = parseHookConfig({
    PreToolUse: [
      { matcher: "bash", hooks: ["check-bash"] },
      { hooks: ["check-all"] },
    ],
  })

  it("filters by tool name when one is given", () => {
    expect(getHooks(config, "PreToolUse", "read").map((h) => h.command)).toEqual(["check-all"])
    expect(getHooks(config, "PreToolUse", "bash").map((h) => h.command)).toEqual(["check-bash", "check-all"])
  })

  it("returns every hook for the event otherwise", () => {
    expect(getHooks(config, "PreToolUse")).toHaveLength(2)
    expect(getHooks(config, "SessionEnd")).toEqual([])
  })
})

describe("parseHookOutput", () => {
  it("reads decision, reason, modified input and context", () => {
    const output = parseHookOutput(
      JSON.stringify({
        decision: "deny",
        reason: "nope",
        modified_input: { command: "ls" },
        additional_context: "lint ok",
      })
    )

    expect(output).toEqual({
      decision: "deny",
      reason: "nope",
      modifiedInput: { command: "ls" },
      additionalContext: "lint ok",
    })
  })

  it("ignores plain text and unknown decisions", () => {
    const empty = { decision: null, reason: null, modifiedInput: null, additionalContext: null }
    expect(parseHookOutput("formatted 3 files\n")).toEqual(empty)
    expect(parseHookOutput('{"decision":"maybe"}')).toEqual(empty)
    expect(parseHookOutput("")).toEqual(empty)
  })
})

describe("executeHook", () => {
  it("sends the JSON payload on stdin with the project dir in the environment", async () => {
    const runner = fakeRunner({})

    await executeHook(
      hook("./guard.sh", "bash", 5),
      "PreToolUse",
      { toolName: "bash", toolInput: { command: "ls" }, cwd: "/work" },
      runner
    )

    expect(runner).toHaveBeenCalledTimes(1)
    const [command, request] = runner.mock.calls[0]
    expect(command).toBe("./guard.sh")
    expect(JSON.parse(request.input)).toEqual({
      hook_event: "PreToolUse",
      cwd: "/work",
      tool_name: "bash",
      tool_input: { command: "ls" },
    })
    expect(request.cwd).toBe("/work")
    expect(request.env.LOCO_PROJECT_DIR).toBe("/work")
    expect(request.timeoutMs).toBe(5000)
  })

  it("reports a timeout", async () => {
    const runner = fakeRunner({ slow: outcome({ exitCode: -1, timedOut: true }) })

    const result = await executeHook(hook("slow", null, 5), "SessionStart", { cwd: "/work" }, runner)

    expect(result.success).toBe(false)
    expect(result.exitCode).toBe(-1)
    expect(result.stderr).toBe("Hook timed out after 5 seconds")
  })

  it("leaves an empty tool input out of the payload", async () => {
    const runner = fakeRunner({})

    await checkPreToolHooks([hook("guard")], "read", {}, { cwd: "/work", runner })

    expect(JSON.parse(runner.mock.calls[0][1].input)).toEqual({
      hook_event: "PreToolUse",
      cwd: "/work",
      tool_name: "read",
    })
  })

  it("turns a runner failure into a failed result", async () => {
    const runner = jest.fn(async (): Promise<CommandOutcome> => {
      throw new Error("spawn sh ENOENT")
    })

    const result = await executeHook(hook("x"), "SessionEnd", { cwd: "/work" }, runner)

    expect(result).toMatchObject({ success: false, exitCode: -1, stderr: "spawn sh ENOENT" })
  })

  it("only parses stdout of successful hooks", async () => {
    const runner = fakeRunner({ failing: outcome({ exitCode: 1, stdout: '{"decision":"deny"}' }) })

    const result = await executeHook(hook("failing"), "PreToolUse", { cwd: "/work" }, runner)

    expect(result.success).toBe(false)
    expect(result.decision).toBeNull()
  })
})

describe("checkPreToolHooks", () => {
  it("blocks on a deny decision but still runs later hooks", async () => {
    const runner = fakeRunner({
      deny: outcome({ stdout: '{"decision":"deny","reason":"Command matches dangerous pattern: rm -rf /"}' }),
    })

    const result = await checkPreToolHooks([hook("deny"), hook("after")], "bash", { command: "rm -rf /" }, { cwd: "/work", runner })

    expect(result).toEqual({
      allowed: false,
      reason: "Command matches dangerous pattern: rm -rf /",
      modifiedInput: null,
    })
    expect(runner).toHaveBeenCalledTimes(2)
  })

  it("blocks on exit code 2 using stderr as the reason", async () => {
    const runner = fakeRunner({ block: outcome({ exitCode: 2, stderr: "blocked by policy\n" }) })

    const result = await checkPreToolHooks([hook("block")], "write", {}, { cwd: "/work", runner })

    expect(result).toEqual({ allowed: false, reason: "blocked by policy", modifiedInput: null })
  })

  it("falls back to a generic reason when a blocking hook is silent", async () => {
    const runner = fakeRunner({ block: outcome({ exitCode: 2 }) })

    const result = await checkPreToolHooks([hook("block")], "write", {}, { cwd: "/work", runner })

    expect(result.reason).toBe("Hook blocked execution")
  })

  it("allows the tool and keeps the last modified input", async () => {
    const runner = fakeRunner({
      first: outcome({ stdout: '{"modified_input":{"command":"ls -a"}}' }),
      second: outcome({ stdout: '{"modified_input":{"command":"ls -la"}}' }),
      other: outcome({ exitCode: 1, stderr: "non-blocking" }),
    })

    const result = await checkPreToolHooks([hook("first"), hook("second"), hook("other")], "bash", { command: "ls" }, { cwd: "/work", runner })

    expect(result).toEqual({ allowed: true, reason: null, modifiedInput: { command: "ls -la" } })
  })
})

describe("runPostToolHooks", () => {
  it("joins additional context and warnings from failed hooks", async () => {
    const runner = fakeRunner({
      lint: outcome({ stdout: '{"additional_context":"2 lint warnings"}' }),
      fmt: outcome({ exitCode: 1, stderr: "prettier not found\n" }),
      quiet: outcome(),
    })

    const context = await runPostToolHooks([hook("lint"), hook("fmt"), hook("quiet")], "write", { path: "a.ts" }, "ok", { cwd: "/work", runner })

    expect(context).toBe("2 lint warnings\n[Hook warning: prettier not found]")
  })

  it("returns null when no hook adds anything", async () => {
    const runner = fakeRunner({})

    expect(await runPostToolHooks([hook("quiet")], "write", {}, "ok", { cwd: "/work", runner })).toBeNull()
  })

  it("passes the tool output in the payload", async () => {
    const runner = fakeRunner({})

    await runPostToolHooks([hook("quiet")], "write", { path: "a.ts" }, "wrote 10 bytes", { cwd: "/work", runner })

    expect(JSON.parse(runner.mock.calls[0][1].input)).toMatchObject({
      hook_event: "PostToolUse",
      tool_output: "wrote 10 bytes",
    })
  })
})

describe("runShellCommand", () => {
  function request(input = "", timeoutMs = 5000) {
    return { input, cwd: os.tmpdir(), env: process.env, timeoutMs }
  }

  it("pipes the payload to the command and captures its output", async () => {
    const result = await runShellCommand("cat", request('{"hook_event":"SessionStart"}'))

    expect(result).toEqual({ exitCode: 0, stdout: '{"hook_event":"SessionStart"}', stderr: "", timedOut: false })
  })

  it("reports the exit code and stderr", async () => {
    const result = await runShellCommand("echo blocked by policy >&2; exit 2", request())

    expect(result.exitCode).toBe(2)
    expect(result.stderr).toBe("blocked by policy\n")
    expect(result.timedOut).toBe(false)
  })

  it("stops a command whose shell forked children once the timeout elapses", async () => {
    const started = Date.now()

    const result = await executeHook(hook("sleep 6; echo done", null, 1), "SessionStart", { cwd: os.tmpdir() })

    expect(Date.now() - started).toBeLessThan(3000)
    expect(result.success).toBe(false)
    expect(result.stdout).toBe("")
    expect(result.stderr).toBe("Hook timed out after 1 seconds")
  })
})
