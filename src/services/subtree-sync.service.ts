import { CI_CONSTANTS, DEFAULT_CONFIG } from "../constants";
import { getCallSite } from "../utils/call-site";
import { retry } from "../utils/retry";

import { GitService, pullUrl } from "./git.service";
import { Logger } from "./logger.service";

import type { CiEnvironmentService } from "./ci-environment.service";
import type { EnvironmentService } from "./environment.service";
import type { GitFactory, RetryConfig, SubtreeConfig, SubtreeServiceOptions, SyncOptions } from "../types";

/**
 * Brings a subtree's working directory to a clean checkout of the remote branch.
 */
export class SubtreeSyncService {
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

  async sync(prefix: string, options: SyncOptions = {}): Promise<SubtreeConfig> {
    const config = this.environment.resolveSubtree(prefix, { callSite: getCallSite(1) });
    await this.syncSubtree(config, options);
    return config;
  }

  async syncSubtree(config: SubtreeConfig, options: SyncOptions = {}): Promise<void> {
    const { dir, subtree, repo, branch } = config;
    const git = this.createGit(dir);

    if (!(await git.isRepository())) {
      this.logger.info(`Initializing repository in ${dir}`);
      await git.init();
    }

    if (await git.hasHead()) {
      await git.resetHard();
    }

    if (this.ciEnvironment.isCiBuild(CI_CONSTANTS.SUBTREE_TASK)) {
      this.logger.debug("Sparse checkout of %s", subtree);
      await git.enableSparseCheckout(subtree);
    }

    await git.checkoutBranch(branch);

    await retry(() => git.pullRebase(pullUrl(repo), branch, { force: true }), {
      ...this.retryConfig,
      maxAttempts: options.attempts ?? DEFAULT_CONFIG.RETRY.SYNC_ATTEMPTS,
      onRetry: () => this.logger.info(`Retry pull from: ${repo} ${branch}`),
    });

    this.logger.info(`Synchronized ${repo} ${branch} into ${dir}`);
  }
}
