import type { Logger } from "../services/logger.service";

export type EnvironmentRecord = Record<string, string | undefined>;

export type OsName = "osx" | "linux";

/**
 * One subtree configuration, keyed by its prefix (e.g. `DOCS` for
 * `DOCS_SUBTREE`, `DOCS_DIR`, `DOCS_REPO` and `DOCS_BRANCH`).
 */
export interface SubtreeConfig {
  prefix: string;
  /** Path inside the remote repository that is checked out and published. */
  subtree: string;
  /** Local working directory holding the checkout. */
  dir: string;
  /** GitHub `owner/name` identifier. */
  repo: string;
  branch: string;
}

/**
 * Target of a publish. Whole-history pushes (`--all`, `--mirror`) run without a branch.
 */
export type PublishTarget = Omit<SubtreeConfig, "branch"> & { branch?: string };

/** Raw values collected for one prefix before validation. */
export type SubtreeSettings = { prefix: string } & {
  [K in keyof Omit<SubtreeConfig, "prefix">]?: string;
};

export interface CiSettings {
  buildDir: string;
  ciTarget: string;
  ciOs: string;
  makeCmd: string;
  gitName: string;
  gitEmail: string;
  isCi: boolean;
  eventName?: string;
  ghToken?: string;
}

/** Delay between attempts. How many attempts to make is decided per command. */
export interface RetryConfig {
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitterMs?: number;
}

export interface SubtreeFileEntry {
  subtree?: string;
  dir?: string;
  repo?: string;
  branch?: string;
}

export interface ConfigFile {
  subtrees: Record<string, SubtreeFileEntry>;
  retry?: RetryConfig;
}

export interface PullOptions {
  force?: boolean;
}

/**
 * Git operations the synchronizer and publisher need, bound to one working directory.
 */
export interface SubtreeGit {
  isRepository(): Promise<boolean>;
  init(): Promise<void>;
  hasHead(): Promise<boolean>;
  resetHard(): Promise<void>;
  enableSparseCheckout(pattern: string): Promise<void>;
  checkoutBranch(branch: string): Promise<void>;
  pullRebase(url: string, branch: string, options?: PullOptions): Promise<void>;
  addAll(pathspec: string): Promise<void>;
  setIdentity(name: string, email: string): Promise<void>;
  /** Resolves to false when there was nothing to commit. */
  commit(message: string): Promise<boolean>;
  push(url: string, branch: string | undefined, args: string[]): Promise<void>;
}

export type GitFactory = (dir: string) => SubtreeGit;

export interface SyncOptions {
  attempts?: number;
}

export interface PublishOptions {
  attempts?: number;
  pushArgs?: string;
  /** Skip the confirmation prompt of local builds. */
  assumeYes?: boolean;
}

export type PublishOutcome = "pushed" | "skipped-no-token" | "exhausted" | "declined" | "pushed-local";

export interface PublishResult {
  status: 0 | 1;
  outcome: PublishOutcome;
  /** Pull/push cycles started. */
  attempts: number;
}

export interface TruncateResult {
  newRoot: string;
  oldHead: string;
  newHead: string;
}

export interface SubtreeServiceOptions {
  retry?: RetryConfig;
  createGit?: GitFactory;
  logger?: Logger;
}
