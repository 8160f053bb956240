/**
 * Entry Scanner
 *
 * Lists the manifests of one layer and parses them into frozen entries.
 * Listing is sorted by file name (code-unit order) so that duplicate names
 * inside a layer always resolve the same way: the last one listed wins.
 *
 * @purpose Turn <root>/skills/<name>/SKILL.md and <root>/agents/<name>.md into entries
 */

import * as fs from "fs"
import * as path from "path"
import { parseManifest } from "./manifest.js"
import { AGENTS_DIR, AGENT_EXTENSION, SKILLS_DIR, SKILL_MANIFEST } from "../utils/loco-paths.js"
import type {
  AgentEntry,
  Layer,
  LayerScan,
  ParsedManifest,
  SkillEntry,
  SkippedManifest,
} from "../types/entries.js"

type ListedKind = "directory" | "file"

export function compareNames(left: string, right: string): number {
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code
  }
  return undefined
}

/**
 * Sorted, non-hidden children of `dir` of the requested kind.
 * Symlinks are followed; broken links are ignored.
 */
function listChildren(dir: string, kind: ListedKind, skipped: SkippedManifest[]): string[] {
  let dirents: fs.Dirent[]
  try {
    dirents = fs.readdirSync(dir, { withFileTypes: true })
  } catch (err) {
    const code = errorCode(err)
    if (code !== "ENOENT" && code !== "ENOTDIR") {
      skipped.push({ status: "skipped", sourcePath: dir, reason: `failed reading directory: ${errorMessage(err)}` })
    }
    return []
  }

  const names: string[] = []
  for (const dirent of dirents) {
    if (dirent.name.startsWith(".")) continue

    let isDir = dirent.isDirectory()
    let isFile = dirent.isFile()
    if (dirent.isSymbolicLink()) {
      try {
        const stats = fs.statSync(path.join(dir, dirent.name))
        isDir = stats.isDirectory()
        isFile = stats.isFile()
      } catch {
        continue
      }
    }

    if ((kind === "directory" && isDir) || (kind === "file" && isFile)) {
      names.push(dirent.name)
    }
  }

  return names.sort(compareNames)
}

function readManifest(sourcePath: string): ParsedManifest | SkippedManifest {
  let raw: string
  try {
    raw = fs.readFileSync(sourcePath, "utf-8")
  } catch (err) {
    return { status: "skipped", sourcePath, reason: `failed reading: ${errorMessage(err)}` }
  }
  return parseManifest(raw, sourcePath)
}

function baseFields(manifest: ParsedManifest, layer: Layer) {
  return {
    name: manifest.name,
    description: manifest.description,
    tools: Object.freeze([...manifest.tools]),
    layer: layer.name,
    sourceRoot: layer.root,
    sourcePath: manifest.sourcePath,
    body: manifest.body,
    attributes: Object.freeze({ ...manifest.attributes }),
  }
}

export function scanSkills(layer: Layer): LayerScan<SkillEntry> {
  const skillsDir = path.join(layer.root, SKILLS_DIR)
  const entries: SkillEntry[] = []
  const skipped: SkippedManifest[] = []

  for (const dirName of listChildren(skillsDir, "directory", skipped)) {
    const manifestPath = path.join(skillsDir, dirName, SKILL_MANIFEST)
    // A directory without SKILL.md is not a skill
    if (!fs.existsSync(manifestPath)) continue

    const result = readManifest(manifestPath)
    if (result.status === "skipped") {
      skipped.push(result)
      continue
    }

    const entry: SkillEntry = {
      kind: "skill",
      ...baseFields(result, layer),
      userInvocable: result.userInvocable,
    }
    entries.push(Object.freeze(entry))
  }

  return { layer, entries, skipped }
}

export function scanAgents(layer: Layer): LayerScan<AgentEntry> {
  const agentsDir = path.join(layer.root, AGENTS_DIR)
  const entries: AgentEntry[] = []
  const skipped: SkippedManifest[] = []

  const files = listChildren(agentsDir, "file", skipped).filter((file) => file.endsWith(AGENT_EXTENSION))
  for (const file of files) {
    const result = readManifest(path.join(agentsDir, file))
    if (result.status === "skipped") {
      skipped.push(result)
      continue
    }

    const entry: AgentEntry = {
      kind: "agent",
      ...baseFields(result, layer),
      model: result.model,
    }
    entries.push(Object.freeze(entry))
  }

  return { layer, entries, skipped }
}
