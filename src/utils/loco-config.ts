/**
 * loco Configuration Management
 *
 * Config files are layered like skills and agents:
 *   <global>/config.json → .claude/settings.json → .loco/config.json
 * Hook events merge per event, a later layer replacing an earlier one.
 *
 * @purpose Locate the project root and load layered JSON configuration
 */

import { readFileSync, existsSync, statSync } from "fs"
import { homedir } from "os"
import path from "path"
import chalk from "chalk"
import { layerCandidates } from "../lib/layers.js"
import { parseHookConfig } from "../lib/hooks.js"
import { CONFIG_FILES, PROJECT_DIRS, getGlobalConfigDir } from "./loco-paths.js"
import type { HookConfig } from "../types/hooks.js"
import type { LayerName, LayerRoots } from "../types/entries.js"

export type Settings = Record<string, unknown>

export interface ConfigLayer {
  layer: LayerName
  path: string
  settings: Settings
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

// ============================================================================
// Project Detection
// ============================================================================

function hasProjectMarker(dir: string): boolean {
  return Object.values(PROJECT_DIRS).some((marker) => {
    const candidate = path.join(dir, marker)
    return existsSync(candidate) && statSync(candidate).isDirectory()
  })
}

/**
 * Nearest ancestor holding a .loco/ or .claude/ directory, else startPath itself.
 * The home directory is never a project: ~/.claude holds user-wide settings.
 */
export function findProjectRoot(startPath: string = process.cwd()): string {
  const start = path.resolve(startPath)
  const home = path.resolve(homedir())
  let currentPath = start

  while (true) {
    if (currentPath === home) {
      return start
    }
    if (hasProjectMarker(currentPath)) {
      return currentPath
    }
    const parent = path.dirname(currentPath)
    if (parent === currentPath) {
      return start
    }
    currentPath = parent
  }
}

export function resolveRoots(options: { project?: string; globalDir?: string } = {}): LayerRoots {
  return {
    projectRoot: options.project ? path.resolve(options.project) : findProjectRoot(),
    globalConfigDir: options.globalDir ? path.resolve(options.globalDir) : getGlobalConfigDir(),
  }
}

// ============================================================================
// Config Operations
// ============================================================================

/**
 * Read one JSON config file. Missing → {}; unparsable or non-object → warning and {}.
 */
export function readSettingsFile(filePath: string): Settings {
  if (!existsSync(filePath)) {
    return {}
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"))
    if (isRecord(parsed)) {
      return parsed
    }
    console.warn(chalk.yellow(`Ignoring ${filePath}: top level must be a JSON object`))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.warn(chalk.yellow(`Failed to parse ${filePath}, ignoring it: ${message}`))
  }
  return {}
}

export function configFileFor(layer: LayerName, root: string): string {
  return path.join(root, CONFIG_FILES[layer])
}

export function loadConfigLayers(roots: LayerRoots): ConfigLayer[] {
  return layerCandidates(roots).map((layer) => {
    const filePath = configFileFor(layer.name, layer.root)
    return { layer: layer.name, path: filePath, settings: readSettingsFile(filePath) }
  })
}

/**
 * Merge the "hooks" sections per event: the highest layer that configures
 * an event supplies all of that event's hooks.
 */
export function mergeHookSections(layers: ConfigLayer[]): Settings {
  const merged: Settings = {}
  for (const { settings } of layers) {
    if (isRecord(settings.hooks)) {
      Object.assign(merged, settings.hooks)
    }
  }
  return merged
}

export function loadHookConfig(roots: LayerRoots): HookConfig {
  return parseHookConfig(mergeHookSections(loadConfigLayers(roots)))
}
