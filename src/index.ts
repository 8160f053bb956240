#!/usr/bin/env node
/**
 * loco - skill, agent and hook discovery
 *
 * Resolves what a project has configured across three layers:
 * the global config dir, .claude/ and .loco/ (highest precedence).
 */

import { Command } from "commander"
import chalk from "chalk"
import { listSkillsCommand, showSkillCommand } from "./commands/skills.js"
import type { RootOptions } from "./commands/skills.js"
import { agentsCommand } from "./commands/agents.js"
import { hooksCommand } from "./commands/hooks.js"
import { registerValidateConfigCommand } from "./commands/validate-config.js"

const program = new Command()

program
  .name("loco")
  .description("Discover skills, agents and hooks across global, .claude/ and .loco/ layers")
  .version("0.1.0")
  .option("-p, --project <dir>", "Project root (default: nearest directory with .loco/ or .claude/)")
  .option("-g, --global-dir <dir>", "Global config directory (default: $LOCO_CONFIG_DIR or ~/.config/loco)")

function rootOptions(): RootOptions {
  return program.opts<RootOptions>()
}

const skills = program.command("skills").description("Discovered skills")

skills
  .command("list", { isDefault: true })
  .description("List skills after layer precedence is applied")
  .option("--json", "Output JSON")
  .action((options: { json?: boolean }) => {
    listSkillsCommand({ ...rootOptions(), ...options })
  })

skills
  .command("show <name>")
  .description("Show a skill and its instructions")
  .action((name: string) => {
    showSkillCommand(name, rootOptions())
  })

program
  .command("agents")
  .description("Discovered agents")
  .argument("[action]", "list or show")
  .argument("[name]", "Agent name (for show)")
  .option("--json", "Output JSON (for list)")
  .action((action: string | undefined, name: string | undefined, options: { json?: boolean }) => {
    agentsCommand(action, name, { ...rootOptions(), ...options })
  })

program
  .command("hooks")
  .description("Lifecycle hooks from layered config")
  .argument("[action]", "list or check")
  .argument("[tool]", "Tool name (for check)")
  .option("-i, --input <json>", "Tool input as a JSON object (for check)")
  .action(async (action: string | undefined, tool: string | undefined, options: { input?: string }) => {
    await hooksCommand(action, tool, { ...rootOptions(), ...options })
  })

registerValidateConfigCommand(program)

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)))
  process.exit(1)
})
