import { ConfigLoaderService } from "./services/config-loader.service";
import { CiEnvironmentService, getOs } from "./services/ci-environment.service";
import { EnvironmentService } from "./services/environment.service";
import { GitService } from "./services/git.service";
import { Logger } from "./services/logger.service";
import { SubtreePublishService } from "./services/subtree-publish.service";
import { SubtreeSyncService } from "./services/subtree-sync.service";
import { parseArguments } from "./utils/cli";
import { getErrorMessage } from "./utils/error-message";
import { formatSubtreeTable } from "./utils/subtree-table";

import type { EnvironmentRecord, GitFactory } from "./types";
import type { CliCommand, CliOptions } from "./utils/cli";

export interface RunnerContext {
  env?: EnvironmentRecord;
  /** Used instead of a logger built from `--debug`. */
  logger?: Logger;
  /** Git for the subtree commands; history commands always use `GitService`. */
  createGit?: GitFactory;
}

/**
 * Runs one parsed command and resolves to its exit code. Configuration and git errors reject.
 */
export async function runCommand(
  command: CliCommand,
  options: CliOptions,
  logger: Logger,
  context: RunnerContext = {},
): Promise<number> {
  const configLoader = new ConfigLoaderService();
  const configFile = options.config ? await configLoader.loadConfigFile(options.config) : undefined;
  const environment = new EnvironmentService(configLoader.mergeEnvironment(context.env ?? process.env, configFile));

  if (command.command === "list") {
    logger.table(formatSubtreeTable(environment.listSubtrees()));
    return 0;
  }

  const settings = environment.loadCiSettings();
  const ciEnvironment = new CiEnvironmentService(settings, logger);
  const serviceOptions = { logger, retry: configFile?.retry, createGit: context.createGit };

  switch (command.command) {
    case "clone": {
      const syncService = new SubtreeSyncService(environment, ciEnvironment, serviceOptions);
      await syncService.sync(command.prefix, { attempts: command.attempts });
      return 0;
    }
    case "commit": {
      const publishService = new SubtreePublishService(environment, ciEnvironment, serviceOptions);
      const result = await publishService.publish(command.prefix, {
        attempts: command.attempts,
        pushArgs: command.pushArgs,
        assumeYes: options.yes,
      });
      logger.debug("Publish outcome: %s after %s attempt(s)", result.outcome, result.attempts);
      return result.status;
    }
    case "is-ci":
      return ciEnvironment.isCiBuild(command.task) ? 0 : 1;
    case "os":
      console.log(getOs());
      return 0;
    case "settings":
      console.log(`BUILD_DIR=${settings.buildDir}`);
      console.log(`CI_TARGET=${settings.ciTarget}`);
      console.log(`CI_OS=${settings.ciOs}`);
      console.log(`MAKE_CMD=${settings.makeCmd}`);
      console.log(`GIT_NAME=${settings.gitName}`);
      console.log(`GIT_EMAIL=${settings.gitEmail}`);
      console.log(`CI=${settings.isCi}`);
      console.log(`GH_TOKEN=${settings.ghToken ? "set" : "unset"}`);
      return 0;
    case "truncate":
      await new GitService(options.dir, logger).truncateHistory(command.branch, command.newRoot);
      return 0;
    case "last-tag":
      console.log(await new GitService(options.dir, logger).lastTag());
      return 0;
    case "commits-since":
      console.log(await new GitService(options.dir, logger).commitsSinceTag(command.tag, command.ref));
      return 0;
  }
}

/**
 * Parses `args`, runs the command and maps every failure to exit code 1 with a
 * `ci: error:` line.
 */
export async function runCli(args: string[], context: RunnerContext = {}): Promise<number> {
  let logger = context.logger ?? Logger.createDefault();

  try {
    const { command, options } = parseArguments(args);
    logger = context.logger ?? Logger.createDefault(options.debug);
    return await runCommand(command, options, logger, context);
  } catch (error) {
    logger.error(getErrorMessage(error));
    return 1;
  }
}
