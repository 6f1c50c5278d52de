import { access, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { CliIo } from "./cli.js";
import { parseArgs, runCli } from "./cli.js";

const SPEC = ["## [slug: alpha]", "", "```yaml", "title: Alpha", "body: B", "```", ""].join(
  "\n",
);

const capture = () => {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
};

describe("parseArgs", () => {
  it("parses sync flags and config paths", () => {
    expect(parseArgs(["sync", "--config=conf.json", "--dry-run", "--prune"])).toEqual({
      command: "sync",
      options: { configPath: "conf.json", dryRun: true, prune: true },
    });
    expect(parseArgs(["plan", "--config", "conf.json"])).toEqual({
      command: "plan",
      options: { configPath: "conf.json" },
    });
  });

  it("rejects unknown input", () => {
    expect(parseArgs([])).toEqual({ error: "Missing command." });
    expect(parseArgs(["push"])).toEqual({ error: "Unknown command 'push'." });
    expect(parseArgs(["plan", "--prune"])).toEqual({ error: "Unknown option '--prune'." });
    expect(parseArgs(["sync", "--config"])).toEqual({ error: "Missing value for --config" });
  });
});

describe("runCli", () => {
  let tempDir: string;
  let stdout: ReturnType<typeof capture>;
  let stderr: ReturnType<typeof capture>;

  const io = (): CliIo => ({
    stdout: stdout.stream,
    stderr: stderr.stream,
    cwd: tempDir,
    env: {},
  });

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "issuemark-cli-"));
    stdout = capture();
    stderr = capture();
    await writeFile(path.join(tempDir, "spec.md"), SPEC, "utf8");
    await writeFile(
      path.join(tempDir, ".issuemark.json"),
      JSON.stringify({
        paths: { specFile: "spec.md" },
        github: { backend: "memory" },
        logging: { level: "silent" },
      }),
      "utf8",
    );
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await rm(tempDir, { recursive: true, force: true });
  });

  it("syncs and prints the summary", async () => {
    await runCli(["sync"], io());

    expect(stdout.text()).toBe(
      [
        "Sync summary",
        "Specs: 1, Created: 1, Updated: 0, Closed: 0, Skipped: 0",
        "",
        "Created",
        '- [alpha] "Alpha" -> #1',
        "",
      ].join("\n"),
    );
    await expect(access(path.join(tempDir, ".issuemark", "index.json"))).resolves.toBeUndefined();
    await expect(access(path.join(tempDir, "issues_summary.json"))).resolves.toBeUndefined();
    expect(process.exitCode).toBeUndefined();
  });

  it("plans without writing the index", async () => {
    await runCli(["plan"], io());

    expect(stdout.text()).toBe(
      [
        "Sync summary (dry run)",
        "Specs: 1, Created: 1, Updated: 0, Closed: 0, Skipped: 0",
        "",
        "Created",
        '- [alpha] "Alpha"',
        "",
        "Plan",
        "- [alpha] create (no matching issue)",
        "",
      ].join("\n"),
    );
    await expect(access(path.join(tempDir, ".issuemark", "index.json"))).rejects.toThrow();
  });

  it("exits non-zero when reconcile finds drift", async () => {
    await runCli(["reconcile"], io());

    expect(stdout.text()).toBe(
      "Reconcile: 1 spec(s), 0 live issue(s), 1 drift item(s)\n- spec only: alpha (Alpha)\n",
    );
    expect(process.exitCode).toBe(1);
  });

  it("reports configuration errors", async () => {
    await runCli(["sync", "--config", "missing.json"], io());

    expect(stderr.text()).toMatch(/^Configuration error: Failed to read config at /);
    expect(process.exitCode).toBe(1);
  });
});
