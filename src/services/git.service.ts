import * as fs from "fs/promises";
import * as path from "path";

import simpleGit from "simple-git";

import { GIT_CONSTANTS } from "../constants";
import { GitOperationError, InvalidRefError, isNothingToCommitError } from "../errors";
import { getErrorMessage, toError } from "../utils/error-message";

import { Logger } from "./logger.service";

import type { PullOptions, SubtreeGit, TruncateResult } from "../types";
import type { SimpleGit } from "simple-git";

export function pullUrl(repo: string): string {
  return `${GIT_CONSTANTS.PULL_URL_BASE}${repo}`;
}

export function pushUrl(repo: string): string {
  return `${GIT_CONSTANTS.PUSH_URL_BASE}${repo}`;
}

/**
 * Git commands for one working directory. Every command runs with `baseDir` set to that
 * directory, so the process working directory is never changed.
 */
export class GitService implements SubtreeGit {
  private git: SimpleGit | null = null;
  private logger: Logger;

  constructor(
    private readonly dir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault();
  }

  private getGit(): SimpleGit {
    // simple-git refuses a baseDir that does not exist yet, so bind lazily
    if (!this.git) {
      this.git = simpleGit(this.dir);
    }
    return this.git;
  }

  private async run<T>(operation: string, fn: (git: SimpleGit) => Promise<T>): Promise<T> {
    try {
      return await fn(this.getGit());
    } catch (error) {
      if (error instanceof GitOperationError) {
        throw error;
      }
      throw new GitOperationError(operation, getErrorMessage(error), toError(error));
    }
  }

  async isRepository(): Promise<boolean> {
    try {
      const stats = await fs.stat(path.join(this.dir, GIT_CONSTANTS.GIT_DIR));
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  async init(): Promise<void> {
    this.logger.debug("Initializing repository in %s", this.dir);
    await fs.mkdir(this.dir, { recursive: true });
    await this.run("init", async (git) => {
      await git.init();
    });
  }

  async hasHead(): Promise<boolean> {
    try {
      await this.getGit().revparse(["--verify", "HEAD"]);
      return true;
    } catch {
      return false;
    }
  }

  async resetHard(): Promise<void> {
    await this.run("reset", async (git) => {
      await git.reset(["--hard", "HEAD"]);
    });
  }

  async enableSparseCheckout(pattern: string): Promise<void> {
    await this.run("config", async (git) => {
      await git.addConfig("core.sparsecheckout", "true");
    });

    const sparseFile = path.join(this.dir, GIT_CONSTANTS.GIT_DIR, GIT_CONSTANTS.SPARSE_CHECKOUT_FILE);
    await fs.mkdir(path.dirname(sparseFile), { recursive: true });
    await fs.writeFile(sparseFile, `${pattern}\n`, "utf8");
  }

  async checkoutBranch(branch: string): Promise<void> {
    await this.run("checkout", async (git) => {
      await git.checkout(["-B", branch]);
    });
  }

  async pullRebase(url: string, branch: string, options: PullOptions = {}): Promise<void> {
    const args = ["pull", "--rebase"];
    if (options.force) {
      args.push("--force");
    }
    args.push(url, branch);

    await this.run("pull", async (git) => {
      await git.raw(args);
    });
  }

  async addAll(pathspec: string): Promise<void> {
    await this.run("add", async (git) => {
      await git.add(["--all", `./${pathspec}`]);
    });
  }

  async setIdentity(name: string, email: string): Promise<void> {
    await this.run("config", async (git) => {
      await git.addConfig("user.name", name, false, "local");
      await git.addConfig("user.email", email, false, "local");
    });
  }

  async commit(message: string): Promise<boolean> {
    try {
      const output = await this.getGit().raw(["commit", "-m", message]);
      // git exits non-zero without stderr here, which simple-git resolves
      return !isNothingToCommitError(output);
    } catch (error) {
      if (isNothingToCommitError(getErrorMessage(error))) {
        return false;
      }
      throw new GitOperationError("commit", getErrorMessage(error), toError(error));
    }
  }

  async push(url: string, branch: string | undefined, args: string[]): Promise<void> {
    const pushArgs = ["push", ...args, url];
    if (branch) {
      pushArgs.push(branch);
    }

    await this.run("push", async (git) => {
      await git.raw(pushArgs);
    });
  }

  async revParse(ref: string): Promise<string> {
    const result = await this.run("rev-parse", (git) => git.revparse([ref]));
    return result.trim();
  }

  /**
   * Rewrites `branch` so its history starts at `newRoot`, squashing everything up to it.
   */
  async truncateHistory(branch: string, newRoot: string): Promise<TruncateResult> {
    let oldHead: string;
    try {
      oldHead = await this.revParse(branch);
    } catch (error) {
      throw new InvalidRefError(branch, toError(error));
    }

    let rootCommit: string;
    try {
      rootCommit = await this.revParse(newRoot);
    } catch (error) {
      throw new InvalidRefError(newRoot, toError(error));
    }

    const temp = GIT_CONSTANTS.TRUNCATE_BRANCH;
    await this.run("checkout", (git) => git.raw(["checkout", "--orphan", temp, rootCommit]));
    await this.run("commit", (git) => git.raw(["commit", "-m", GIT_CONSTANTS.TRUNCATE_MESSAGE]));
    await this.run("rebase", (git) => git.raw(["rebase", "--onto", temp, rootCommit, branch]));
    await this.run("branch", (git) => git.raw(["branch", "-D", temp]));

    const newHead = await this.revParse("HEAD");

    this.logger.info(`truncate: new_root: ${rootCommit}`);
    this.logger.info(`truncate: old HEAD: ${oldHead}`);
    this.logger.info(`truncate: new HEAD: ${newHead}`);

    return { newRoot: rootCommit, oldHead, newHead };
  }

  async lastTag(): Promise<string> {
    const tag = await this.run("describe", (git) =>
      git.raw(["describe", "--abbrev=0", `--exclude=${GIT_CONSTANTS.TAG_EXCLUDE}`]),
    );
    return tag.trim();
  }

  async commitsSinceTag(tag: string, ref: string): Promise<number> {
    const output = await this.run("rev-list", (git) => git.raw(["rev-list", `${tag}..${ref}`, "--count"]));
    const count = Number.parseInt(output.trim(), 10);
    if (Number.isNaN(count)) {
      throw new GitOperationError("rev-list", `unexpected output: ${output.trim()}`);
    }
    this.logger.info(`commits since tag: tag=${tag} commits_since=${count}`);
    return count;
  }
}
