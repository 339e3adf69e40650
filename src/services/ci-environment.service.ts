import * as os from "os";

import { CI_CONSTANTS } from "../constants";

import { Logger } from "./logger.service";

import type { CiSettings, OsName } from "../types";

/**
 * Maps the kernel name reported by `uname -s` to the OS label used in build scripts.
 */
export function getOs(systemName: string = os.type()): OsName {
  return systemName === CI_CONSTANTS.DARWIN ? "osx" : "linux";
}

export class CiEnvironmentService {
  private logger: Logger;

  constructor(
    readonly settings: CiSettings,
    logger?: Logger,
  ) {
    this.logger = logger ?? Logger.createDefault();
  }

  /**
   * @param task Work that local builds skip; reported unless it is `--silent`.
   */
  isCiBuild(task: string = CI_CONSTANTS.DEFAULT_LOCAL_SKIP_TASK): boolean {
    if (!this.settings.isCi) {
      if (task !== CI_CONSTANTS.SILENT) {
        this.logger.info(`Local build, skip ${task}`);
      }
      return false;
    }
    return true;
  }

  isPullRequest(): boolean {
    return this.settings.eventName === CI_CONSTANTS.PULL_REQUEST_EVENT;
  }

  /**
   * Exit status for a build that lacks private data: pull requests pass, everything else fails.
   */
  canFailWithoutPrivate(): 0 | 1 {
    return this.isPullRequest() ? 0 : 1;
  }

  hasGhToken(): boolean {
    return Boolean(this.settings.ghToken);
  }
}
