import type { RemoteClient } from "./adapters.js";
import type { IssuemarkConfig } from "./config.js";
import { ConfigError } from "./config.js";
import type { CommandRunner } from "./github-cli-client.js";
import { GitHubCliClient } from "./github-cli-client.js";
import type { FetchLike } from "./github-rest-client.js";
import { GitHubRestClient } from "./github-rest-client.js";
import { InMemoryRemoteClient } from "./memory-remote-client.js";

export interface RemoteClientOverrides {
  fetch?: FetchLike;
  runner?: CommandRunner;
}

export const createRemoteClient = (
  github: IssuemarkConfig["github"],
  overrides: RemoteClientOverrides = {},
): RemoteClient => {
  switch (github.backend) {
    case "rest":
      if (!github.repo || !github.token) {
        throw new ConfigError(
          "Missing required GitHub settings for rest backend: repo, token",
        );
      }
      return new GitHubRestClient({
        repo: github.repo,
        token: github.token,
        apiUrl: github.apiUrl,
        fetch: overrides.fetch,
      });
    case "cli":
      return new GitHubCliClient({ repo: github.repo, runner: overrides.runner });
    case "memory":
      return new InMemoryRemoteClient();
  }
};
