import { parseManifest, parseToolList, splitFrontMatter } from "../manifest.js"

describe("parseManifest", () => {
  it("reads name, description and a comma-separated tool list", () => {
    const raw = `---
name: test-agent
description: A test agent from .claude directory
tools: read, grep
---

# Test Agent
This is a test agent loaded from .claude/agents/
`
    const result = parseManifest(raw, "/p/.claude/agents/test-agent.md")

    expect(result).toEqual({
      status: "parsed",
      sourcePath: "/p/.claude/agents/test-agent.md",
      name: "test-agent",
      description: "A test agent from .claude directory",
      tools: ["read", "grep"],
      userInvocable: true,
      model: null,
      attributes: {},
      body: "# Test Agent\nThis is a test agent loaded from .claude/agents/",
    })
  })

  it("accepts allowed-tools as a YAML sequence", () => {
    const raw = "---\nname: deploy\nallowed-tools:\n  - Read\n  - Bash\n---\nbody"
    const result = parseManifest(raw, "SKILL.md")

    expect(result.status).toBe("parsed")
    if (result.status !== "parsed") return
    expect(result.tools).toEqual(["Read", "Bash"])
  })

  it("prefers tools over capabilities when both are present", () => {
    const raw = "---\nname: x\ntools: [a]\ncapabilities: [b]\n---\n"
    const result = parseManifest(raw, "x.md")

    expect(result.status === "parsed" && result.tools).toEqual(["a"])
  })

  it("keeps unknown keys as attributes and reads user-invocable and model", () => {
    const raw = `---
name: reviewer
version: 1.0.0
color: blue
user-invocable: false
model: sonnet
---
Review things.`
    const result = parseManifest(raw, "reviewer.md")

    expect(result.status).toBe("parsed")
    if (result.status !== "parsed") return
    expect(result.attributes).toEqual({ version: "1.0.0", color: "blue" })
    expect(result.userInvocable).toBe(false)
    expect(result.model).toBe("sonnet")
    expect(result.body).toBe("Review things.")
  })

  it("tolerates CRLF line endings and a byte order mark", () => {
    const raw = "\uFEFF---\r\nname: windows\r\ndescription: crlf\r\n---\r\nline one\r\n"
    const result = parseManifest(raw, "w.md")

    expect(result.status === "parsed" && [result.name, result.description, result.body]).toEqual([
      "windows",
      "crlf",
      "line one",
    ])
  })

  it("skips a file without front-matter", () => {
    expect(parseManifest("# Just markdown\n", "a.md")).toEqual({
      status: "skipped",
      sourcePath: "a.md",
      reason: "missing front-matter block",
    })
  })

  it("skips unterminated front-matter", () => {
    const result = parseManifest("---\nname: open\n", "b.md")
    expect(result.status === "skipped" && result.reason).toBe("unterminated front-matter block")
  })

  it("skips front-matter that is not valid YAML", () => {
    const result = parseManifest("---\nname: [unclosed\n---\n", "c.md")

    expect(result.status).toBe("skipped")
    if (result.status !== "skipped") return
    expect(result.reason).toMatch(/^invalid front-matter: /)
  })

  it("skips front-matter that is not a mapping", () => {
    const result = parseManifest("---\n- a\n- b\n---\n", "d.md")
    expect(result.status === "skipped" && result.reason).toBe("front-matter is not a mapping")
  })

  it("skips empty front-matter", () => {
    const result = parseManifest("---\n---\nbody", "e.md")
    expect(result.status === "skipped" && result.reason).toBe("front-matter is not a mapping")
  })

  it("skips manifests without a name", () => {
    expect(parseManifest("---\ndescription: nameless\n---\n", "f.md")).toEqual({
      status: "skipped",
      sourcePath: "f.md",
      reason: "missing name",
    })
    const blank = parseManifest("---\nname: \"   \"\n---\n", "g.md")
    expect(blank.status === "skipped" && blank.reason).toBe("missing name")
  })
})

describe("splitFrontMatter", () => {
  it("separates the block from a trimmed body", () => {
    expect(splitFrontMatter("---\na: 1\n---\n\n\nbody\n\n")).toEqual({ block: "a: 1", body: "body" })
  })
})

describe("parseToolList", () => {
  it("drops blanks and non-scalar items", () => {
    expect(parseToolList(["read", 3, null, " grep ", ""])).toEqual(["read", "3", "grep"])
    expect(parseToolList("read, , write")).toEqual(["read", "write"])
    expect(parseToolList({ read: true })).toEqual([])
  })
})
