/**
 * WorkspaceToolServer Tests
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_TOOL_LIMITS, type ToolContext } from "@taskloop/agent-runtime-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { globToRegExp, WorkspaceToolServer } from "../tools/workspace/workspaceServer";

describe("WorkspaceToolServer", () => {
  let root: string;
  let context: ToolContext;
  const server = new WorkspaceToolServer();

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "taskloop-workspace-"));
    context = { taskId: "task-1", workspaceRoot: root, limits: DEFAULT_TOOL_LIMITS };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("lists the workspace tools", () => {
    expect(server.listTools().map((tool) => tool.name)).toEqual([
      "workspace_read",
      "workspace_write",
      "workspace_list",
      "workspace_search",
      "workspace_apply_patch",
    ]);
  });

  describe("workspace_read", () => {
    it("returns file content", async () => {
      await fs.writeFile(path.join(root, "notes.txt"), "alpha\nbeta\n");

      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "notes.txt" } },
        context
      );

      expect(result).toEqual({ success: true, content: "alpha\nbeta\n" });
    });

    it("reads a file whose name starts with two dots", async () => {
      await fs.writeFile(path.join(root, "..notes"), "inside\n");

      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "..notes" } },
        context
      );

      expect(result).toEqual({ success: true, content: "inside\n" });
    });

    it("returns a 1-based inclusive line range", async () => {
      await fs.writeFile(path.join(root, "lines.txt"), "one\ntwo\nthree\nfour");

      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "lines.txt", start_line: 2, end_line: 3 } },
        context
      );

      expect(result.content).toEqual({
        path: "lines.txt",
        start_line: 2,
        end_line: 3,
        total_lines: 4,
        content: "two\nthree",
      });
    });

    it("rejects an inverted range", async () => {
      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "x", start_line: 3, end_line: 1 } },
        context
      );

      expect(result.error?.code).toBe("INVALID_ARGUMENTS");
    });

    it("fails with SANDBOX_VIOLATION for ../../etc/passwd", async () => {
      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "../../etc/passwd" } },
        context
      );

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe("SANDBOX_VIOLATION");
      expect(result.content).toBe("Path escapes workspace: ../../etc/passwd");
    });

    it("reports missing files as RESOURCE_NOT_FOUND", async () => {
      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "missing.txt" } },
        context
      );

      expect(result.error).toEqual({
        code: "RESOURCE_NOT_FOUND",
        message: "No such file or directory: missing.txt",
      });
    });

    it("reports directories as EXECUTION_FAILED", async () => {
      await fs.mkdir(path.join(root, "src"));

      const result = await server.callTool(
        { name: "workspace_read", arguments: { path: "src" } },
        context
      );

      expect(result.error?.code).toBe("EXECUTION_FAILED");
      expect(result.error?.message).toBe("Is a directory: src");
    });
  });

  describe("workspace_write", () => {
    it("creates parent directories and overwrites", async () => {
      await server.callTool(
        { name: "workspace_write", arguments: { path: "a/b/c.txt", content: "first" } },
        context
      );
      const result = await server.callTool(
        { name: "workspace_write", arguments: { path: "a/b/c.txt", content: "héllo" } },
        context
      );

      expect(result.content).toEqual({ path: "a/b/c.txt", bytes: 6 });
      await expect(fs.readFile(path.join(root, "a", "b", "c.txt"), "utf-8")).resolves.toBe(
        "héllo"
      );
    });

    it("does not write outside the workspace", async () => {
      const result = await server.callTool(
        { name: "workspace_write", arguments: { path: "../escape.txt", content: "x" } },
        context
      );

      expect(result.error?.code).toBe("SANDBOX_VIOLATION");
      await expect(fs.stat(path.join(path.dirname(root), "escape.txt"))).rejects.toThrow();
    });
  });

  describe("workspace_list", () => {
    it("lists entries sorted by name with their type", async () => {
      await fs.writeFile(path.join(root, "b.txt"), "");
      await fs.mkdir(path.join(root, "a-dir"));
      await fs.writeFile(path.join(root, "C.md"), "");

      const result = await server.callTool({ name: "workspace_list", arguments: {} }, context);

      expect(result.content).toEqual({
        path: ".",
        entries: [
          { name: "C.md", type: "file" },
          { name: "a-dir", type: "dir" },
          { name: "b.txt", type: "file" },
        ],
      });
    });

    it("lists a symlink to a directory as a directory", async () => {
      await fs.mkdir(path.join(root, "real"));
      await fs.symlink(path.join(root, "real"), path.join(root, "linked"));
      await fs.symlink(path.join(root, "gone"), path.join(root, "dangling"));

      const result = await server.callTool({ name: "workspace_list", arguments: {} }, context);

      expect(result.content).toEqual({
        path: ".",
        entries: [
          { name: "dangling", type: "file" },
          { name: "linked", type: "dir" },
          { name: "real", type: "dir" },
        ],
      });
    });

    it("reports a missing directory", async () => {
      const result = await server.callTool(
        { name: "workspace_list", arguments: { path: "nope" } },
        context
      );

      expect(result.error?.code).toBe("RESOURCE_NOT_FOUND");
    });
  });

  describe("workspace_search", () => {
    beforeEach(async () => {
      await fs.mkdir(path.join(root, "src"));
      await fs.mkdir(path.join(root, "node_modules"));
      await fs.writeFile(
        path.join(root, "src", "main.ts"),
        "const a = 1;\n  export function run() {}\n"
      );
      await fs.writeFile(path.join(root, "src", "util.py"), "def run():\n    pass\n");
      await fs.writeFile(path.join(root, "node_modules", "dep.ts"), "function run() {}\n");
    });

    it("finds matches across files and skips vendored directories", async () => {
      const result = await server.callTool(
        { name: "workspace_search", arguments: { query: "run\\(" } },
        context
      );

      expect(result.content).toEqual({
        query: "run\\(",
        matches: [
          { file: "src/main.ts", line: 2, match: "export function run() {}" },
          { file: "src/util.py", line: 1, match: "def run():" },
        ],
        truncated: false,
      });
    });

    it("filters files by glob", async () => {
      const result = await server.callTool(
        { name: "workspace_search", arguments: { query: "run", glob: "**/*.py" } },
        context
      );

      expect(result.content).toEqual({
        query: "run",
        matches: [{ file: "src/util.py", line: 1, match: "def run():" }],
        truncated: false,
      });
    });

    it("caps results and flags truncation", async () => {
      const limited: ToolContext = {
        ...context,
        limits: { ...DEFAULT_TOOL_LIMITS, maxSearchResults: 1 },
      };

      const result = await server.callTool(
        { name: "workspace_search", arguments: { query: "run" } },
        limited
      );

      expect(result.content).toEqual({
        query: "run",
        matches: [{ file: "src/main.ts", line: 2, match: "export function run() {}" }],
        truncated: true,
      });
    });

    it("rejects an invalid regular expression", async () => {
      const result = await server.callTool(
        { name: "workspace_search", arguments: { query: "(" } },
        context
      );

      expect(result.error?.code).toBe("INVALID_ARGUMENTS");
    });
  });

  describe("workspace_apply_patch", () => {
    it("modifies and creates files", async () => {
      await fs.writeFile(path.join(root, "hello.txt"), "hello\nworld\n");
      const diff = [
        "diff --git a/hello.txt b/hello.txt",
        "--- a/hello.txt",
        "+++ b/hello.txt",
        "@@ -1,2 +1,2 @@",
        " hello",
        "-world",
        "+there",
        "--- /dev/null",
        "+++ b/docs/new.md",
        "@@ -0,0 +1 @@",
        "+# New",
        "",
      ].join("\n");

      const result = await server.callTool(
        { name: "workspace_apply_patch", arguments: { unified_diff: diff } },
        context
      );

      expect(result.content).toEqual({
        files: [
          { path: "hello.txt", action: "modified" },
          { path: "docs/new.md", action: "created" },
        ],
      });
      await expect(fs.readFile(path.join(root, "hello.txt"), "utf-8")).resolves.toBe(
        "hello\nthere\n"
      );
      await expect(fs.readFile(path.join(root, "docs", "new.md"), "utf-8")).resolves.toBe(
        "# New\n"
      );
    });

    it("applies entries for the same file one after another", async () => {
      await fs.writeFile(path.join(root, "list.txt"), "one\ntwo\nthree\nfour\nfive\n");
      const diff = [
        "--- a/list.txt",
        "+++ b/list.txt",
        "@@ -1,2 +1,2 @@",
        "-one",
        "+ONE",
        " two",
        "--- a/list.txt",
        "+++ b/list.txt",
        "@@ -4,2 +4,2 @@",
        " four",
        "-five",
        "+FIVE",
        "",
      ].join("\n");

      const result = await server.callTool(
        { name: "workspace_apply_patch", arguments: { unified_diff: diff } },
        context
      );

      expect(result.content).toEqual({ files: [{ path: "list.txt", action: "modified" }] });
      await expect(fs.readFile(path.join(root, "list.txt"), "utf-8")).resolves.toBe(
        "ONE\ntwo\nthree\nfour\nFIVE\n"
      );
    });

    it("writes nothing when any hunk fails", async () => {
      await fs.writeFile(path.join(root, "a.txt"), "one\n");
      await fs.writeFile(path.join(root, "b.txt"), "two\n");
      const diff = [
        "--- a/a.txt",
        "+++ b/a.txt",
        "@@ -1 +1 @@",
        "-one",
        "+uno",
        "--- a/b.txt",
        "+++ b/b.txt",
        "@@ -1 +1 @@",
        "-three",
        "+tres",
        "",
      ].join("\n");

      const result = await server.callTool(
        { name: "workspace_apply_patch", arguments: { unified_diff: diff } },
        context
      );

      expect(result.error).toEqual({
        code: "EXECUTION_FAILED",
        message: "Hunks do not apply to b.txt",
      });
      await expect(fs.readFile(path.join(root, "a.txt"), "utf-8")).resolves.toBe("one\n");
    });

    it("refuses targets outside the workspace", async () => {
      const diff = ["--- /dev/null", "+++ b/../../evil.txt", "@@ -0,0 +1 @@", "+x", ""].join(
        "\n"
      );

      const result = await server.callTool(
        { name: "workspace_apply_patch", arguments: { unified_diff: diff } },
        context
      );

      expect(result.error?.code).toBe("SANDBOX_VIOLATION");
    });
  });
});

describe("globToRegExp", () => {
  it("matches single and multi segment wildcards", () => {
    expect(globToRegExp("*.ts").test("main.ts")).toBe(true);
    expect(globToRegExp("*.ts").test("src/main.ts")).toBe(false);
    expect(globToRegExp("src/**/*.ts").test("src/main.ts")).toBe(true);
    expect(globToRegExp("src/**/*.ts").test("src/a/b/main.ts")).toBe(true);
    expect(globToRegExp("file?.txt").test("file1.txt")).toBe(true);
  });
});
