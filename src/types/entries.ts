/**
 * Skill & Agent Entry Types
 */

export type LayerName = "global" | "claude" | "loco"

export interface Layer {
  name: LayerName
  rank: number
  root: string
}

export interface LayerRoots {
  projectRoot: string
  globalConfigDir: string
}

interface BaseEntry {
  name: string
  description: string
  tools: readonly string[]
  layer: LayerName
  sourceRoot: string
  sourcePath: string
  body: string
  attributes: Readonly<Record<string, unknown>>
}

export interface SkillEntry extends BaseEntry {
  kind: "skill"
  userInvocable: boolean
}

export interface AgentEntry extends BaseEntry {
  kind: "agent"
  model: string | null
}

export type Entry = SkillEntry | AgentEntry

/**
 * Name → entry, one entry per name (the highest-precedence layer's)
 */
export type Registry<T extends Entry = Entry> = ReadonlyMap<string, T>

export interface ParsedManifest {
  status: "parsed"
  sourcePath: string
  name: string
  description: string
  tools: string[]
  userInvocable: boolean
  model: string | null
  attributes: Record<string, unknown>
  body: string
}

export interface SkippedManifest {
  status: "skipped"
  sourcePath: string
  reason: string
}

export type ManifestResult = ParsedManifest | SkippedManifest

export interface LayerScan<T extends Entry> {
  layer: Layer
  entries: T[]
  skipped: SkippedManifest[]
}

export interface DiscoveryResult<T extends Entry> {
  registry: Registry<T>
  layers: Layer[]
  skipped: SkippedManifest[]
}
