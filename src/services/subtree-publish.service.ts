import { CI_CONSTANTS, DEFAULT_CONFIG, ENV_VARS, PUSH_ARGS, SUBTREE_SUFFIXES } from "../constants";
import { isRetryableGitError } from "../errors";
import { getCallSite } from "../utils/call-site";
import { getErrorMessage } from "../utils/error-message";
import { confirmPublish, promptCommitMessage } from "../utils/interactive";
import { retry } from "../utils/retry";

import { GitService, pullUrl, pushUrl } from "./git.service";
import { Logger } from "./logger.service";

import type { CiEnvironmentService } from "./ci-environment.service";
import type { EnvironmentService } from "./environment.service";
import type {
  GitFactory,
  PublishOptions,
  PublishResult,
  PublishTarget,
  RetryConfig,
  SubtreeGit,
  SubtreeServiceOptions,
} from "../types";

export function splitPushArgs(pushArgs: string): string[] {
  return pushArgs.split(/\s+/).filter((arg) => arg.length > 0);
}

export function skipsPull(pushArgs: string): boolean {
  return PUSH_ARGS.SKIP_PULL.some((flag) => pushArgs.includes(flag));
}

export function pushesWithoutBranch(pushArgs: string): boolean {
  return PUSH_ARGS.NO_BRANCH.some((flag) => pushArgs.includes(flag));
}

export function automaticCommitMessage(ciTarget: string): string {
  return `${ciTarget.replace(/-/g, " ")}: ${CI_CONSTANTS.AUTOMATIC_UPDATE_SUFFIX}`;
}

/**
 * Commits changes under a subtree and pushes them back to the remote.
 *
 * In CI the push is retried up to `attempts` times, pulling with rebase before each try
 * unless the push arguments make the remote state irrelevant. Local builds ask before
 * committing and push once.
 */
export class SubtreePublishService {
  private logger: Logger;
  private createGit: GitFactory;
  private retryConfig: RetryConfig;

  constructor(
    private environment: EnvironmentService,
    private ciEnvironment: CiEnvironmentService,
    options: SubtreeServiceOptions = {},
  ) {
    const logger = options.logger ?? Logger.createDefault();
    this.logger = logger;
    this.createGit = options.createGit ?? ((dir) => new GitService(dir, logger));
    this.retryConfig = options.retry ?? {};
  }

  async publish(prefix: string, options: PublishOptions = {}): Promise<PublishResult> {
    const callSite = getCallSite(1);
    const pushArgs = options.pushArgs ?? "";
    const { settings } = this.ciEnvironment;

    this.environment.requireValue(ENV_VARS.CI_TARGET, settings.ciTarget, callSite);
    this.environment.requireValue(ENV_VARS.GIT_NAME, settings.gitName, callSite);
    this.environment.requireValue(ENV_VARS.GIT_EMAIL, settings.gitEmail, callSite);

    const target = this.environment.resolveSubtree(prefix, {
      requireBranch: !pushesWithoutBranch(pushArgs),
      callSite,
    });

    return this.publishSubtree(target, options);
  }

  async publishSubtree(target: PublishTarget, options: PublishOptions = {}): Promise<PublishResult> {
    const git = this.createGit(target.dir);

    await git.addAll(target.subtree);

    if (this.ciEnvironment.isCiBuild(CI_CONSTANTS.SILENT)) {
      return this.publishFromCi(git, target, options);
    }
    return this.publishFromLocal(git, target, options);
  }

  private async publishFromCi(git: SubtreeGit, target: PublishTarget, options: PublishOptions): Promise<PublishResult> {
    const { settings } = this.ciEnvironment;
    const { repo, branch } = target;
    const attempts = options.attempts ?? DEFAULT_CONFIG.RETRY.PUBLISH_ATTEMPTS;
    const pushArgs = options.pushArgs ?? "";

    await git.setIdentity(settings.gitName, settings.gitEmail);

    const committed = await git.commit(automaticCommitMessage(settings.ciTarget));
    if (!committed) {
      this.logger.debug("Nothing to commit in %s", target.subtree);
    }

    let cycles = 0;
    if (attempts < 1) {
      return { status: 1, outcome: "exhausted", attempts: cycles };
    }

    try {
      return await retry(
        async (attempt): Promise<PublishResult> => {
          cycles = attempt;

          if (!skipsPull(pushArgs)) {
            if (!branch) {
              throw new Error(`${target.prefix}${SUBTREE_SUFFIXES.branch} is required to pull before pushing`);
            }
            await git.pullRebase(pullUrl(repo), branch);
          }

          if (!this.ciEnvironment.hasGhToken()) {
            this.logger.info(`${ENV_VARS.GH_TOKEN} not set; push skipped`);
            this.logger.info("To test pull requests, see instructions in README.md");
            return { status: this.ciEnvironment.canFailWithoutPrivate(), outcome: "skipped-no-token", attempts: cycles };
          }

          await git.push(pushUrl(repo), branch, splitPushArgs(pushArgs));
          this.logger.info(`Pushed to: ${repo} ${branch ?? ""}`.trimEnd());
          return { status: 0, outcome: "pushed", attempts: cycles };
        },
        {
          ...this.retryConfig,
          maxAttempts: attempts,
          onRetry: (error) => {
            this.logger.debug("Attempt failed: %s", getErrorMessage(error));
            this.logger.info(`Retry push to: ${repo} ${branch ?? ""}`.trimEnd());
          },
        },
      );
    } catch (error) {
      if (!isRetryableGitError(error)) {
        throw error;
      }
      this.logger.error(`Giving up on ${repo} after ${cycles} attempt(s):`, error);
      return { status: 1, outcome: "exhausted", attempts: cycles };
    }
  }

  private async publishFromLocal(
    git: SubtreeGit,
    target: PublishTarget,
    options: PublishOptions,
  ): Promise<PublishResult> {
    const { repo, branch, prefix } = target;
    const question =
      `Build finished; commit and push to ${repo}:${branch ?? "*"} ? ` +
      `(change by setting ${prefix}${SUBTREE_SUFFIXES.repo}/${prefix}${SUBTREE_SUFFIXES.branch})`;

    if (!options.assumeYes && !(await confirmPublish(question))) {
      this.logger.info(`Publishing to ${repo} declined`);
      return { status: 0, outcome: "declined", attempts: 0 };
    }

    const defaultMessage = automaticCommitMessage(this.ciEnvironment.settings.ciTarget);
    const message = options.assumeYes ? defaultMessage : await promptCommitMessage(defaultMessage);
    const committed = await git.commit(message);
    if (!committed) {
      this.logger.warn("Nothing to commit");
    }

    await git.push(pushUrl(repo), branch, splitPushArgs(options.pushArgs ?? ""));
    this.logger.info(`Pushed to: ${repo} ${branch ?? ""}`.trimEnd());
    return { status: 0, outcome: "pushed-local", attempts: 1 };
  }
}
