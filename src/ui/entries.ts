/**
 * Registry rendering shared by `loco skills` and `loco agents`
 */

import chalk from "chalk"
import type { Entry, LayerName, Registry } from "../types/entries.js"

const LAYER_COLORS: Record<LayerName, (s: string) => string> = {
  global: chalk.gray,
  claude: chalk.magenta,
  loco: chalk.cyan,
}

export function layerLabel(layer: LayerName): string {
  return LAYER_COLORS[layer](`[${layer}]`)
}

export function toJson(entry: Entry): Record<string, unknown> {
  return {
    kind: entry.kind,
    name: entry.name,
    description: entry.description,
    tools: entry.tools,
    layer: entry.layer,
    sourcePath: entry.sourcePath,
  }
}

export function printRegistry(title: string, registry: Registry): void {
  console.log(chalk.bold(`\n${title} (${registry.size})\n`))

  if (registry.size === 0) {
    console.log(chalk.gray("  None found.\n"))
    return
  }

  for (const entry of registry.values()) {
    console.log(`  ${chalk.green("✓")} ${chalk.white(entry.name)} ${layerLabel(entry.layer)}`)
    if (entry.description) {
      console.log(`     ${chalk.gray(entry.description)}`)
    }
    if (entry.tools.length > 0) {
      console.log(`     ${chalk.gray(`tools: ${entry.tools.join(", ")}`)}`)
    }
  }

  console.log()
}

export function printEntry(entry: Entry): void {
  console.log(chalk.bold(`\n${entry.name} ${layerLabel(entry.layer)}\n`))
  if (entry.description) console.log(chalk.gray(`  ${entry.description}`))
  console.log(chalk.gray(`  Source: ${entry.sourcePath}`))
  if (entry.tools.length > 0) console.log(chalk.gray(`  Tools: ${entry.tools.join(", ")}`))
  if (entry.kind === "agent" && entry.model) console.log(chalk.gray(`  Model: ${entry.model}`))
  if (entry.kind === "skill" && !entry.userInvocable) console.log(chalk.gray("  Not user-invocable"))
  console.log()
  console.log(entry.body)
  console.log()
}
