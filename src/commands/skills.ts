/**
 * loco Skills Commands
 */

import chalk from "chalk"
import { discoverSkills } from "../lib/discovery.js"
import { getEntry } from "../lib/registry.js"
import { resolveRoots } from "../utils/loco-config.js"
import { printEntry, printRegistry, toJson } from "../ui/entries.js"

export type RootOptions = {
  project?: string
  globalDir?: string
}

/**
 * List skills
 */
export function listSkillsCommand(options: RootOptions & { json?: boolean } = {}): void {
  const { registry, layers } = discoverSkills({ ...resolveRoots(options), quiet: options.json })

  if (options.json) {
    console.log(JSON.stringify([...registry.values()].map(toJson), null, 2))
    return
  }

  printRegistry("Skills", registry)
  if (layers.length > 0) {
    console.log(chalk.gray(`  Scanned: ${layers.map((layer) => layer.root).join(", ")}\n`))
  }
}

/**
 * Show one skill with its instructions
 */
export function showSkillCommand(name: string, options: RootOptions = {}): void {
  const { registry } = discoverSkills(resolveRoots(options))
  const skill = getEntry(registry, name)

  if (!skill) {
    console.error(chalk.red(`\nSkill not found: ${name}\n`))
    process.exitCode = 1
    return
  }

  printEntry(skill)
}
