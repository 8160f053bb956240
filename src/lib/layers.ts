/**
 * Layer Enumerator
 *
 * Discovery roots in precedence order, lowest first:
 * global config → .claude/ → .loco/
 */

import * as fs from "fs"
import * as path from "path"
import { PROJECT_DIRS } from "../utils/loco-paths.js"
import type { Layer, LayerName, LayerRoots } from "../types/entries.js"

export const LAYER_ORDER: readonly LayerName[] = ["global", "claude", "loco"]

export function layerCandidates(roots: LayerRoots): Layer[] {
  const rootFor: Record<LayerName, string> = {
    global: path.resolve(roots.globalConfigDir),
    claude: path.resolve(roots.projectRoot, PROJECT_DIRS.claude),
    loco: path.resolve(roots.projectRoot, PROJECT_DIRS.loco),
  }

  return LAYER_ORDER.map((name, rank) => ({ name, rank, root: rootFor[name] }))
}

export function isDirectory(target: string): boolean {
  try {
    return fs.statSync(target).isDirectory()
  } catch {
    return false
  }
}

/**
 * Layers whose root exists. An absent layer is normal and contributes nothing.
 */
export function enumerateLayers(roots: LayerRoots): Layer[] {
  return layerCandidates(roots).filter((layer) => isDirectory(layer.root))
}
