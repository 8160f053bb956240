/**
 * Manifest Parser
 *
 * Reads the YAML front-matter block of a SKILL.md or agent .md file.
 * Malformed manifests come back as SkippedManifest records, never as thrown errors.
 *
 * @purpose Parse skill/agent front-matter into a ParsedManifest | SkippedManifest union
 */

import { parse as parseYaml } from "yaml"
import type { ManifestResult, SkippedManifest } from "../types/entries.js"

const DELIMITER = "---"
const TOOL_KEYS = ["tools", "allowed-tools", "capabilities"] as const
const KNOWN_KEYS = new Set<string>(["name", "description", "user-invocable", "model", ...TOOL_KEYS])

interface FrontMatterSplit {
  block: string
  body: string
}

function skipped(sourcePath: string, reason: string): SkippedManifest {
  return { status: "skipped", sourcePath, reason }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Split raw file content into its front-matter block and body.
 * Returns a reason string when the block is missing or unterminated.
 */
export function splitFrontMatter(raw: string): FrontMatterSplit | string {
  const lines = raw.replace(/^\uFEFF/, "").replace(/\r\n/g, "\n").split("\n")

  if (lines[0]?.trim() !== DELIMITER) {
    return "missing front-matter block"
  }

  const closing = lines.findIndex((line, index) => index > 0 && line.trim() === DELIMITER)
  if (closing === -1) {
    return "unterminated front-matter block"
  }

  return {
    block: lines.slice(1, closing).join("\n"),
    body: lines.slice(closing + 1).join("\n").trim(),
  }
}

/**
 * Normalize a tool list given either as a YAML sequence or "read, grep"
 */
export function parseToolList(value: unknown): string[] {
  if (typeof value === "string") {
    return value.split(",").map((tool) => tool.trim()).filter(Boolean)
  }
  if (Array.isArray(value)) {
    return value
      .filter((tool): tool is string | number => typeof tool === "string" || typeof tool === "number")
      .map((tool) => String(tool).trim())
      .filter(Boolean)
  }
  return []
}

export function parseManifest(raw: string, sourcePath: string): ManifestResult {
  const split = splitFrontMatter(raw)
  if (typeof split === "string") {
    return skipped(sourcePath, split)
  }

  let data: unknown
  try {
    data = parseYaml(split.block)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return skipped(sourcePath, `invalid front-matter: ${message}`)
  }

  if (!isRecord(data)) {
    return skipped(sourcePath, "front-matter is not a mapping")
  }

  const name = typeof data.name === "string" ? data.name.trim() : ""
  if (!name) {
    return skipped(sourcePath, "missing name")
  }

  const toolKey = TOOL_KEYS.find((key) => data[key] !== undefined)
  const attributes: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      attributes[key] = value
    }
  }

  return {
    status: "parsed",
    sourcePath,
    name,
    description: typeof data.description === "string" ? data.description.trim() : "",
    tools: toolKey ? parseToolList(data[toolKey]) : [],
    userInvocable: typeof data["user-invocable"] === "boolean" ? data["user-invocable"] : true,
    model: typeof data.model === "string" && data.model.trim() ? data.model.trim() : null,
    attributes,
    body: split.body,
  }
}
