export const ENV_VARS = {
  BUILD_DIR: "BUILD_DIR",
  CI_TARGET: "CI_TARGET",
  TRAVIS_OS_NAME: "TRAVIS_OS_NAME",
  MAKE_CMD: "MAKE_CMD",
  GIT_NAME: "GIT_NAME",
  GIT_EMAIL: "GIT_EMAIL",
  CI: "CI",
  GITHUB_EVENT_NAME: "GITHUB_EVENT_NAME",
  GH_TOKEN: "GH_TOKEN",
} as const;

export const SUBTREE_SUFFIXES = {
  subtree: "_SUBTREE",
  dir: "_DIR",
  repo: "_REPO",
  branch: "_BRANCH",
} as const;

export const GIT_CONSTANTS = {
  PULL_URL_BASE: "git://github.com/",
  PUSH_URL_BASE: "https://github.com/",
  GIT_DIR: ".git",
  SPARSE_CHECKOUT_FILE: "info/sparse-checkout",
  TRUNCATE_BRANCH: "temp",
  TRUNCATE_MESSAGE: "truncate history",
  TAG_EXCLUDE: "nightly",
} as const;

export const PUSH_ARGS = {
  // Pushes that ignore remote state, so pulling first is pointless.
  SKIP_PULL: ["--force", "--all", "--mirror"],
  // Pushes that do not target a single branch.
  NO_BRANCH: ["--all", "--mirror"],
} as const;

export const CI_CONSTANTS = {
  CI_TRUE: "true",
  PULL_REQUEST_EVENT: "pull_request",
  SILENT: "--silent",
  DEFAULT_LOCAL_SKIP_TASK: "installing dependencies",
  SUBTREE_TASK: "Git subtree",
  AUTOMATIC_UPDATE_SUFFIX: "Automatic update",
  DARWIN: "Darwin",
} as const;

export const DEFAULT_CONFIG = {
  MAKE_CMD: "make -j2",
  GIT_NAME: "ci-bot",
  GIT_EMAIL: "ci-bot@users.noreply.github.com",
  CI_TARGET: "subtree-ci",
  RETRY: {
    PUBLISH_ATTEMPTS: 4,
    SYNC_ATTEMPTS: 1,
    DELAY_MS: 1000,
    MAX_DELAY_MS: 30000,
    BACKOFF_MULTIPLIER: 1,
    JITTER_MS: 0,
  },
} as const;

export const ERROR_MESSAGES = {
  NOTHING_TO_COMMIT: ["nothing to commit", "nothing added to commit", "no changes added to commit"],
  ENV_VAR_HINT: "Maybe you need to export it before calling subtree-ci?",
  RETRYABLE_OPERATIONS: ["pull", "push"],
} as const;

export const LOG_PREFIX = "ci";
