/**
 * Centralized loco directory path management
 *
 * @purpose Single source of truth for loco paths (global and project-local)
 */

import { homedir, platform } from 'os'
import { join } from 'path'

/**
 * Get XDG config home directory (cross-platform)
 */
function getConfigHome(): string {
  if (platform() === 'win32') {
    return process.env.APPDATA || join(homedir(), 'AppData', 'Roaming')
  }
  return process.env.XDG_CONFIG_HOME || join(homedir(), '.config')
}

/**
 * Global loco config directory: the lowest-precedence discovery layer.
 * LOCO_CONFIG_DIR overrides the XDG location.
 */
export function getGlobalConfigDir(): string {
  return process.env.LOCO_CONFIG_DIR || join(getConfigHome(), 'loco')
}

export const PROJECT_DIRS = {
  // Shared convention directory, read for compatibility
  claude: '.claude',
  // Project-native directory, highest precedence
  loco: '.loco',
} as const

export const CONFIG_FILES = {
  global: 'config.json',
  claude: 'settings.json',
  loco: 'config.json',
} as const

export const SKILLS_DIR = 'skills'
export const SKILL_MANIFEST = 'SKILL.md'
export const AGENTS_DIR = 'agents'
export const AGENT_EXTENSION = '.md'

/**
 * Get project-local .loco file
 * @param projectRoot - Absolute path to project root
 * @param filename - File within .loco/ directory
 */
export function getProjectLocoFile(projectRoot: string, filename: string): string {
  return join(projectRoot, PROJECT_DIRS.loco, filename)
}
