import * as path from "path";

import { CI_CONSTANTS, DEFAULT_CONFIG, ENV_VARS, SUBTREE_SUFFIXES } from "../constants";
import { MissingEnvironmentVariableError } from "../errors";
import { getCallSite } from "../utils/call-site";

import { getOs } from "./ci-environment.service";

import type { CiSettings, EnvironmentRecord, PublishTarget, SubtreeConfig, SubtreeSettings } from "../types";

const SUBTREE_VARIABLE = new RegExp(`^(.+)${SUBTREE_SUFFIXES.subtree}$`);
const SCRIPT_EXTENSION = /\.(sh|js|ts)$/;

/**
 * Groups `{PREFIX}_SUBTREE`, `_DIR`, `_REPO` and `_BRANCH` variables by prefix.
 * A prefix is known once its `_SUBTREE` variable is present.
 */
export function collectSubtreeSettings(env: EnvironmentRecord): Map<string, SubtreeSettings> {
  const registry = new Map<string, SubtreeSettings>();
  const prefixes = Object.keys(env)
    .map((key) => key.match(SUBTREE_VARIABLE)?.[1])
    .filter((prefix): prefix is string => prefix !== undefined)
    .sort();

  for (const prefix of prefixes) {
    registry.set(prefix, {
      prefix,
      subtree: nonEmpty(env[prefix + SUBTREE_SUFFIXES.subtree]),
      dir: nonEmpty(env[prefix + SUBTREE_SUFFIXES.dir]),
      repo: nonEmpty(env[prefix + SUBTREE_SUFFIXES.repo]),
      branch: nonEmpty(env[prefix + SUBTREE_SUFFIXES.branch]),
    });
  }

  return registry;
}

export function defaultCiTarget(scriptPath?: string): string {
  if (!scriptPath) {
    return DEFAULT_CONFIG.CI_TARGET;
  }
  return path.basename(scriptPath).replace(SCRIPT_EXTENSION, "") || DEFAULT_CONFIG.CI_TARGET;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export interface ResolveSubtreeOptions {
  requireBranch?: boolean;
  callSite?: string;
}

export class EnvironmentService {
  private registry: Map<string, SubtreeSettings>;

  constructor(
    private env: EnvironmentRecord = process.env,
    private scriptPath: string | undefined = process.argv[1],
  ) {
    this.registry = collectSubtreeSettings(env);
  }

  /**
   * Returns the value of `name`, or throws when it is unset or empty.
   * `callSite` defaults to the caller's `file:line`.
   */
  requireVariable(name: string, callSite: string = getCallSite(1)): string {
    return this.requireValue(name, this.env[name], callSite);
  }

  requireValue(name: string, value: string | undefined, callSite: string = getCallSite(1)): string {
    if (!value) {
      throw new MissingEnvironmentVariableError(name, callSite);
    }
    return value;
  }

  optionalVariable(name: string): string | undefined {
    return nonEmpty(this.env[name]);
  }

  /**
   * Resolves the four settings of `prefix`, failing on the first missing one in
   * subtree, dir, repo, branch order.
   */
  resolveSubtree(prefix: string, options?: { requireBranch?: true; callSite?: string }): SubtreeConfig;
  resolveSubtree(prefix: string, options: ResolveSubtreeOptions): PublishTarget;
  resolveSubtree(prefix: string, options: ResolveSubtreeOptions = {}): PublishTarget {
    const callSite = options.callSite ?? getCallSite(1);
    const settings = this.registry.get(prefix) ?? { prefix };

    const subtree = this.requireValue(prefix + SUBTREE_SUFFIXES.subtree, settings.subtree, callSite);
    const dir = this.requireValue(prefix + SUBTREE_SUFFIXES.dir, settings.dir, callSite);
    const repo = this.requireValue(prefix + SUBTREE_SUFFIXES.repo, settings.repo, callSite);

    if (options.requireBranch === false) {
      return { prefix, subtree, dir, repo, branch: settings.branch };
    }

    const branch = this.requireValue(prefix + SUBTREE_SUFFIXES.branch, settings.branch, callSite);
    return { prefix, subtree, dir, repo, branch };
  }

  listSubtrees(): SubtreeSettings[] {
    return Array.from(this.registry.values());
  }

  /**
   * Reads the settings every build needs. `BUILD_DIR` is mandatory; the rest have defaults.
   */
  loadCiSettings(callSite: string = getCallSite(1)): CiSettings {
    const buildDir = this.requireVariable(ENV_VARS.BUILD_DIR, callSite);

    return {
      buildDir,
      ciTarget: this.optionalVariable(ENV_VARS.CI_TARGET) ?? defaultCiTarget(this.scriptPath),
      ciOs: this.optionalVariable(ENV_VARS.TRAVIS_OS_NAME) ?? getOs(),
      makeCmd: this.optionalVariable(ENV_VARS.MAKE_CMD) ?? DEFAULT_CONFIG.MAKE_CMD,
      gitName: this.optionalVariable(ENV_VARS.GIT_NAME) ?? DEFAULT_CONFIG.GIT_NAME,
      gitEmail: this.optionalVariable(ENV_VARS.GIT_EMAIL) ?? DEFAULT_CONFIG.GIT_EMAIL,
      isCi: this.env[ENV_VARS.CI] === CI_CONSTANTS.CI_TRUE,
      eventName: this.optionalVariable(ENV_VARS.GITHUB_EVENT_NAME),
      ghToken: this.optionalVariable(ENV_VARS.GH_TOKEN),
    };
  }
}
