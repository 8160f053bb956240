/**
 * Skill & Agent Discovery
 *
 * Each call enumerates the layers, scans them, and merges the result.
 * Nothing is cached between calls, so a removed manifest disappears on the next scan.
 *
 * @purpose Build the skill and agent registries for a project
 */

import chalk from "chalk"
import { enumerateLayers } from "./layers.js"
import { scanAgents, scanSkills } from "./entry-scanner.js"
import { mergeLayers } from "./registry.js"
import { getGlobalConfigDir } from "../utils/loco-paths.js"
import type {
  AgentEntry,
  DiscoveryResult,
  Entry,
  Layer,
  LayerScan,
  SkillEntry,
} from "../types/entries.js"

export interface DiscoveryOptions {
  projectRoot?: string
  globalConfigDir?: string
  quiet?: boolean
}

function discover<T extends Entry>(
  label: string,
  scan: (layer: Layer) => LayerScan<T>,
  options: DiscoveryOptions
): DiscoveryResult<T> {
  const layers = enumerateLayers({
    projectRoot: options.projectRoot ?? process.cwd(),
    globalConfigDir: options.globalConfigDir ?? getGlobalConfigDir(),
  })

  const scans = layers.map(scan)
  const skipped = scans.flatMap((result) => result.skipped)

  if (!options.quiet) {
    for (const item of skipped) {
      console.warn(chalk.yellow(`[${label}] Skipped ${item.sourcePath}: ${item.reason}`))
    }
  }

  return {
    registry: mergeLayers(scans.map((result) => result.entries)),
    layers,
    skipped,
  }
}

export function discoverSkills(options: DiscoveryOptions = {}): DiscoveryResult<SkillEntry> {
  return discover("skills", scanSkills, options)
}

export function discoverAgents(options: DiscoveryOptions = {}): DiscoveryResult<AgentEntry> {
  return discover("agents", scanAgents, options)
}
