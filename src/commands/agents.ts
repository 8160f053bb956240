import chalk from "chalk"
import { discoverAgents } from "../lib/discovery.js"
import { getEntry } from "../lib/registry.js"
import { resolveRoots } from "../utils/loco-config.js"
import { printEntry, printRegistry, toJson } from "../ui/entries.js"
import type { RootOptions } from "./skills.js"

export function agentsCommand(action?: string, name?: string, options: RootOptions & { json?: boolean } = {}): void {
  switch (action) {
    case "list":
    case undefined:
      listAgents(options)
      break
    case "show":
      showAgent(name, options)
      break
    default:
      console.log(chalk.bold("\nloco - Agents\n"))
      console.log(chalk.gray("Usage:"))
      console.log("  loco agents              List discovered agents")
      console.log("  loco agents show <name>  Show an agent's system prompt")
      process.exitCode = 1
  }
}

function listAgents(options: RootOptions & { json?: boolean }) {
  const { registry } = discoverAgents({ ...resolveRoots(options), quiet: options.json })

  if (options.json) {
    console.log(JSON.stringify([...registry.values()].map(toJson), null, 2))
    return
  }

  printRegistry("Agents", registry)
}

function showAgent(name: string | undefined, options: RootOptions) {
  if (!name) {
    console.log(chalk.yellow("\nUsage: loco agents show <name>\n"))
    process.exitCode = 1
    return
  }

  const { registry } = discoverAgents(resolveRoots(options))
  const agent = getEntry(registry, name)

  if (!agent) {
    console.error(chalk.red(`\nAgent not found: ${name}\n`))
    process.exitCode = 1
    return
  }

  printEntry(agent)
}
