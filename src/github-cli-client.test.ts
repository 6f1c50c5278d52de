import { describe, expect, it, vi } from "vitest";

import type { CommandResult, CommandRunner } from "./github-cli-client.js";
import { GitHubCliClient } from "./github-cli-client.js";
import { classifyFailure } from "./retry.js";

const ok = (stdout = ""): CommandResult => ({ exitCode: 0, stdout, stderr: "" });

describe("GitHubCliClient", () => {
  it("lists issues with the repo flag", async () => {
    const runner = vi.fn<CommandRunner>(async () =>
      ok(
        JSON.stringify([
          {
            number: 3,
            title: "Alpha",
            body: "B",
            labels: [{ name: "bug" }],
            milestone: { title: "M1" },
            state: "CLOSED",
          },
          { number: 4, title: "Beta", body: "", labels: [], milestone: null, state: "OPEN" },
        ]),
      ),
    );
    const client = new GitHubCliClient({ repo: "octo/repo", runner });

    const records = await client.list();

    expect(runner).toHaveBeenCalledWith("gh", [
      "issue",
      "list",
      "--state",
      "all",
      "--limit",
      "1000",
      "--json",
      "number,title,body,labels,milestone,state",
      "--repo",
      "octo/repo",
    ]);
    expect(records).toEqual([
      { id: 3, title: "Alpha", labels: ["bug"], milestone: "M1", body: "B", state: "CLOSED" },
      { id: 4, title: "Beta", labels: [], milestone: null, body: "", state: "OPEN" },
    ]);
  });

  it("reads the new issue number from the printed URL", async () => {
    const runner = vi.fn<CommandRunner>(async () =>
      ok("https://github.com/octo/repo/issues/17\n"),
    );
    const client = new GitHubCliClient({ runner });

    const id = await client.create({
      title: "Alpha",
      body: "B",
      labels: ["bug", "docs"],
      milestone: "M1",
    });

    expect(id).toBe(17);
    expect(runner.mock.calls[0][1]).toEqual([
      "issue",
      "create",
      "--title",
      "Alpha",
      "--body",
      "B",
      "--label",
      "bug",
      "--label",
      "docs",
      "--milestone",
      "M1",
    ]);
  });

  it("returns null when the URL is missing", async () => {
    const client = new GitHubCliClient({ runner: async () => ok("created\n") });

    await expect(client.create({ title: "Alpha", body: "B" })).resolves.toBeNull();
  });

  it("edits labels against the current set", async () => {
    const runner = vi.fn<CommandRunner>(async (_command, args) =>
      args[1] === "view"
        ? ok(JSON.stringify({ labels: [{ name: "bug" }, { name: "old" }] }))
        : ok(),
    );
    const client = new GitHubCliClient({ runner });

    await client.update(5, { labels: ["bug", "new"], milestone: null });

    expect(runner.mock.calls.map(([, args]) => args)).toEqual([
      ["issue", "view", "5", "--json", "labels"],
      [
        "issue",
        "edit",
        "5",
        "--add-label",
        "new",
        "--remove-label",
        "old",
        "--remove-milestone",
      ],
    ]);
  });

  it("closes through the close command", async () => {
    const runner = vi.fn<CommandRunner>(async () => ok());
    const client = new GitHubCliClient({ runner });

    await client.update(5, { state: "closed" });

    expect(runner.mock.calls.map(([, args]) => args)).toEqual([["issue", "close", "5"]]);
  });

  it("keeps command output in the failure diagnostic", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: 1,
      stdout: "",
      stderr: "API rate limit exceeded. Please wait 30 seconds\n",
    }));
    const client = new GitHubCliClient({ runner });

    const failure = await client.close(2).catch((error: unknown) => error);

    expect(failure).toMatchObject({
      message: "gh issue close failed (exit 1)",
      operation: "close",
      diagnostic: "API rate limit exceeded. Please wait 30 seconds",
    });
    expect(classifyFailure(failure)).toEqual({
      kind: "transient",
      hintMs: 30000,
      reason: "rate limit",
    });
  });
});
