import { beforeEach, describe, expect, it, vi } from "vitest";

import { createCapturingLogger, createFakeGit, createTestEnvironment } from "../../__tests__/test-utils";
import { GitOperationError, MissingEnvironmentVariableError } from "../../errors";
import { confirmPublish, promptCommitMessage } from "../../utils/interactive";
import {
  SubtreePublishService,
  automaticCommitMessage,
  pushesWithoutBranch,
  skipsPull,
  splitPushArgs,
} from "../subtree-publish.service";

import type { EnvironmentRecord } from "../../types";

vi.mock("../../utils/interactive");

const CI_WITH_TOKEN: EnvironmentRecord = { CI: "true", GH_TOKEN: "test-token" };

function setup(env: EnvironmentRecord = {}) {
  const { logger, logs, messages } = createCapturingLogger();
  const { environment, ciEnvironment } = createTestEnvironment(env, logger);
  const git = createFakeGit();
  const service = new SubtreePublishService(environment, ciEnvironment, {
    logger,
    retry: { initialDelayMs: 0 },
    createGit: () => git,
  });
  return { service, git, logs, messages };
}

describe("push argument helpers", () => {
  it("should split push arguments on whitespace", () => {
    expect(splitPushArgs("  --force   --tags ")).toEqual(["--force", "--tags"]);
    expect(splitPushArgs("")).toEqual([]);
  });

  it("should skip the pull for pushes that ignore remote state", () => {
    expect(skipsPull("--force")).toBe(true);
    expect(skipsPull("--all")).toBe(true);
    expect(skipsPull("--mirror")).toBe(true);
    expect(skipsPull("--tags")).toBe(false);
    expect(skipsPull("")).toBe(false);
  });

  it("should push without a branch only for whole-repository pushes", () => {
    expect(pushesWithoutBranch("--mirror")).toBe(true);
    expect(pushesWithoutBranch("--all")).toBe(true);
    expect(pushesWithoutBranch("--force")).toBe(false);
  });

  it("should derive the commit message from the build target", () => {
    expect(automaticCommitMessage("build-docs")).toBe("build docs: Automatic update");
    expect(automaticCommitMessage("nightly")).toBe("nightly: Automatic update");
  });
});

describe("SubtreePublishService", () => {
  describe("publish in CI", () => {
    it("should stage, commit, pull and push", async () => {
      const { service, git, messages } = setup(CI_WITH_TOKEN);

      const result = await service.publish("DOCS");

      expect(result).toEqual({ status: 0, outcome: "pushed", attempts: 1 });
      expect(git.calls).toEqual([
        "addAll site",
        "setIdentity Test Bot test-bot@example.com",
        "commit build docs: Automatic update",
        "pullRebase git://github.com/org/docs gh-pages",
        "push https://github.com/org/docs gh-pages",
      ]);
      expect(messages()).toEqual(["ci: Pushed to: org/docs gh-pages"]);
    });

    it("should push even when there is nothing to commit", async () => {
      const { service, git } = setup(CI_WITH_TOKEN);
      git.commit.mockResolvedValueOnce(false);

      const result = await service.publish("DOCS");

      expect(result.outcome).toBe("pushed");
      expect(git.push).toHaveBeenCalledTimes(1);
    });

    it("should stop retrying once a push succeeds", async () => {
      const { service, git, messages } = setup(CI_WITH_TOKEN);
      git.push.mockRejectedValueOnce(new GitOperationError("push", "rejected"));

      const result = await service.publish("DOCS", { attempts: 4 });

      expect(result).toEqual({ status: 0, outcome: "pushed", attempts: 2 });
      expect(git.pullRebase).toHaveBeenCalledTimes(2);
      expect(git.push).toHaveBeenCalledTimes(2);
      expect(messages()).toEqual(["ci: Retry push to: org/docs gh-pages", "ci: Pushed to: org/docs gh-pages"]);
    });

    it("should retry after a failed pull", async () => {
      const { service, git } = setup(CI_WITH_TOKEN);
      git.pullRebase.mockRejectedValueOnce(new GitOperationError("pull", "conflict"));

      const result = await service.publish("DOCS", { attempts: 2 });

      expect(result).toEqual({ status: 0, outcome: "pushed", attempts: 2 });
      expect(git.pullRebase).toHaveBeenCalledTimes(2);
      expect(git.push).toHaveBeenCalledTimes(1);
    });

    it("should give up after the allowed attempts", async () => {
      const { service, git, logs } = setup(CI_WITH_TOKEN);
      git.push.mockRejectedValue(new GitOperationError("push", "rejected"));

      const result = await service.publish("DOCS", { attempts: 3 });

      expect(result).toEqual({ status: 1, outcome: "exhausted", attempts: 3 });
      expect(git.pullRebase).toHaveBeenCalledTimes(3);
      expect(git.push).toHaveBeenCalledTimes(3);
      expect(logs.filter((entry) => entry.message.startsWith("ci: Retry push to:"))).toHaveLength(2);
      expect(logs[logs.length - 1]).toEqual({
        level: "error",
        message: "ci: error: Giving up on org/docs after 3 attempt(s): Git operation 'push' failed: rejected",
      });
    });

    it("should make exactly the requested attempts whatever the delay settings", async () => {
      const { logger } = createCapturingLogger();
      const { environment, ciEnvironment } = createTestEnvironment(CI_WITH_TOKEN, logger);
      const git = createFakeGit();
      git.push.mockRejectedValue(new GitOperationError("push", "rejected"));
      const service = new SubtreePublishService(environment, ciEnvironment, {
        logger,
        retry: { initialDelayMs: 0, backoffMultiplier: 2, maxDelayMs: 0 },
        createGit: () => git,
      });

      const result = await service.publish("DOCS", { attempts: 1 });

      expect(result).toEqual({ status: 1, outcome: "exhausted", attempts: 1 });
      expect(git.push).toHaveBeenCalledTimes(1);
    });

    it("should fail without pulling or pushing when no attempts are allowed", async () => {
      const { service, git } = setup(CI_WITH_TOKEN);

      const result = await service.publish("DOCS", { attempts: 0 });

      expect(result).toEqual({ status: 1, outcome: "exhausted", attempts: 0 });
      expect(git.calls).toEqual([
        "addAll site",
        "setIdentity Test Bot test-bot@example.com",
        "commit build docs: Automatic update",
      ]);
    });

    it("should rethrow failures that are not pull or push errors", async () => {
      const { service, git } = setup(CI_WITH_TOKEN);
      git.pullRebase.mockRejectedValueOnce(new Error("disk full"));

      await expect(service.publish("DOCS")).rejects.toThrow("disk full");
      expect(git.pullRebase).toHaveBeenCalledTimes(1);
      expect(git.push).not.toHaveBeenCalled();
    });

    it("should rethrow commit failures before touching the remote", async () => {
      const { service, git } = setup(CI_WITH_TOKEN);
      git.commit.mockRejectedValueOnce(new GitOperationError("commit", "hook failed"));

      await expect(service.publish("DOCS")).rejects.toThrow("Git operation 'commit' failed: hook failed");
      expect(git.pullRebase).not.toHaveBeenCalled();
    });
  });

  describe("push arguments", () => {
    it("should push with --force without pulling first", async () => {
      const { service, git } = setup(CI_WITH_TOKEN);

      const result = await service.publish("DOCS", { pushArgs: "--force" });

      expect(result.status).toBe(0);
      expect(git.pullRebase).not.toHaveBeenCalled();
      expect(git.calls[git.calls.length - 1]).toBe("push --force https://github.com/org/docs gh-pages");
    });

    it("should mirror without a configured branch", async () => {
      const { service, git, messages } = setup({ ...CI_WITH_TOKEN, DOCS_BRANCH: "" });

      const result = await service.publish("DOCS", { pushArgs: "--mirror" });

      expect(result).toEqual({ status: 0, outcome: "pushed", attempts: 1 });
      expect(git.pullRebase).not.toHaveBeenCalled();
      expect(git.calls[git.calls.length - 1]).toBe("push --mirror https://github.com/org/docs");
      expect(messages()).toEqual(["ci: Pushed to: org/docs"]);
    });

    it("should require a branch for ordinary pushes", async () => {
      const { service, git } = setup({ ...CI_WITH_TOKEN, DOCS_BRANCH: "" });

      await expect(service.publish("DOCS")).rejects.toThrow(MissingEnvironmentVariableError);
      expect(git.calls).toEqual([]);
    });
  });

  describe("without a push token", () => {
    it("should pull once and fail outside pull requests", async () => {
      const { service, git, messages } = setup({ CI: "true" });

      const result = await service.publish("DOCS", { attempts: 2 });

      expect(result).toEqual({ status: 1, outcome: "skipped-no-token", attempts: 1 });
      expect(git.pullRebase).toHaveBeenCalledTimes(1);
      expect(git.push).not.toHaveBeenCalled();
      expect(messages()).toEqual([
        "ci: GH_TOKEN not set; push skipped",
        "ci: To test pull requests, see instructions in README.md",
      ]);
    });

    it("should succeed for pull requests", async () => {
      const { service, git } = setup({ CI: "true", GITHUB_EVENT_NAME: "pull_request" });

      const result = await service.publish("DOCS", { attempts: 2 });

      expect(result).toEqual({ status: 0, outcome: "skipped-no-token", attempts: 1 });
      expect(git.push).not.toHaveBeenCalled();
    });
  });

  describe("publish in local builds", () => {
    beforeEach(() => {
      vi.mocked(confirmPublish).mockResolvedValue(true);
      vi.mocked(promptCommitMessage).mockResolvedValue("Update docs by hand");
    });

    it("should ask before committing and push once", async () => {
      const { service, git, messages } = setup();

      const result = await service.publish("DOCS");

      expect(result).toEqual({ status: 0, outcome: "pushed-local", attempts: 1 });
      expect(confirmPublish).toHaveBeenCalledWith(
        "Build finished; commit and push to org/docs:gh-pages ? (change by setting DOCS_REPO/DOCS_BRANCH)",
      );
      expect(promptCommitMessage).toHaveBeenCalledWith("build docs: Automatic update");
      expect(git.calls).toEqual([
        "addAll site",
        "commit Update docs by hand",
        "push https://github.com/org/docs gh-pages",
      ]);
      expect(messages()).toEqual(["ci: Pushed to: org/docs gh-pages"]);
    });

    it("should leave the repository alone when declined", async () => {
      vi.mocked(confirmPublish).mockResolvedValueOnce(false);
      const { service, git, messages } = setup();

      const result = await service.publish("DOCS");

      expect(result).toEqual({ status: 0, outcome: "declined", attempts: 0 });
      expect(git.calls).toEqual(["addAll site"]);
      expect(promptCommitMessage).not.toHaveBeenCalled();
      expect(messages()).toEqual(["ci: Publishing to org/docs declined"]);
    });

    it("should skip both prompts with assumeYes", async () => {
      const { service, git } = setup();

      await service.publish("DOCS", { assumeYes: true });

      expect(confirmPublish).not.toHaveBeenCalled();
      expect(promptCommitMessage).not.toHaveBeenCalled();
      expect(git.calls).toContain("commit build docs: Automatic update");
    });

    it("should show a wildcard branch for whole-repository pushes", async () => {
      const { service, git } = setup({ DOCS_BRANCH: "" });

      await service.publish("DOCS", { pushArgs: "--all" });

      expect(confirmPublish).toHaveBeenCalledWith(
        "Build finished; commit and push to org/docs:* ? (change by setting DOCS_REPO/DOCS_BRANCH)",
      );
      expect(git.calls[git.calls.length - 1]).toBe("push --all https://github.com/org/docs");
    });

    it("should warn when there was nothing to commit", async () => {
      const { service, git, logs } = setup();
      git.commit.mockResolvedValueOnce(false);

      await service.publish("DOCS", { assumeYes: true });

      expect(logs).toEqual([
        { level: "warn", message: "ci: warning: Nothing to commit" },
        { level: "info", message: "ci: Pushed to: org/docs gh-pages" },
      ]);
    });
  });
});
