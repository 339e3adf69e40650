import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import { DEFAULT_CONFIG } from "../constants";

export type CliCommand =
  | { command: "clone"; prefix: string; attempts: number }
  | { command: "commit"; prefix: string; attempts: number; pushArgs: string }
  | { command: "is-ci"; task?: string }
  | { command: "os" }
  | { command: "settings" }
  | { command: "list" }
  | { command: "truncate"; branch: string; newRoot: string }
  | { command: "last-tag" }
  | { command: "commits-since"; tag: string; ref: string };

export interface CliOptions {
  config?: string;
  dir: string;
  yes: boolean;
  debug: boolean;
}

export interface ParsedArguments {
  command: CliCommand;
  options: CliOptions;
}

function nonNegativeAttempts(value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`Invalid attempts: ${value}. Expected a non-negative integer`);
  }
  return value;
}

export function parseArguments(args: string[] = hideBin(process.argv)): ParsedArguments {
  const parsed: { command?: CliCommand } = {};

  const argv = yargs(args)
    .scriptName("subtree-ci")
    .usage("$0 <command> [options]")
    .option("config", {
      alias: "c",
      type: "string",
      description: "JSON file mapping prefixes to subtree settings",
    })
    .option("dir", {
      alias: "d",
      type: "string",
      description: "Repository for history commands",
      default: ".",
    })
    .option("yes", {
      alias: "y",
      type: "boolean",
      description: "Skip the confirmation prompt of local builds",
      default: false,
    })
    .option("debug", {
      type: "boolean",
      description: "Print debug output",
      default: false,
    })
    .command(
      "clone <prefix>",
      "Check out the subtree of {PREFIX}_REPO on {PREFIX}_BRANCH into {PREFIX}_DIR",
      (y) =>
        y.positional("prefix", { type: "string", demandOption: true }).option("attempts", {
          type: "number",
          description: "Pull attempts",
          default: DEFAULT_CONFIG.RETRY.SYNC_ATTEMPTS,
        }),
      (a) => {
        parsed.command = { command: "clone", prefix: a.prefix, attempts: nonNegativeAttempts(a.attempts) };
      },
    )
    .command(
      "commit <prefix> [attempts]",
      "Commit changes under {PREFIX}_SUBTREE and push them",
      (y) =>
        y
          .positional("prefix", { type: "string", demandOption: true })
          .positional("attempts", {
            type: "number",
            description: "Push attempts",
            default: DEFAULT_CONFIG.RETRY.PUBLISH_ATTEMPTS,
          })
          .option("push-args", {
            type: "string",
            description: "Extra arguments for git push, e.g. --push-args=--force",
            default: "",
          }),
      (a) => {
        parsed.command = {
          command: "commit",
          prefix: a.prefix,
          attempts: nonNegativeAttempts(a.attempts),
          pushArgs: a["push-args"],
        };
      },
    )
    .command(
      "is-ci [task]",
      "Exit 0 in CI builds, 1 in local builds",
      (y) => y.positional("task", { type: "string" }),
      (a) => {
        parsed.command = { command: "is-ci", task: a.task };
      },
    )
    .command(
      "os",
      "Print the current OS (osx or linux)",
      (y) => y,
      () => {
        parsed.command = { command: "os" };
      },
    )
    .command(
      "settings",
      "Print the resolved build settings",
      (y) => y,
      () => {
        parsed.command = { command: "settings" };
      },
    )
    .command(
      "list",
      "List configured subtree prefixes",
      (y) => y,
      () => {
        parsed.command = { command: "list" };
      },
    )
    .command(
      "truncate <branch> <newRoot>",
      "Rewrite <branch> so its history starts at <newRoot>",
      (y) =>
        y
          .positional("branch", { type: "string", demandOption: true })
          .positional("newRoot", { type: "string", demandOption: true }),
      (a) => {
        parsed.command = { command: "truncate", branch: a.branch, newRoot: a.newRoot };
      },
    )
    .command(
      "last-tag",
      "Print the most recent tag, ignoring nightly",
      (y) => y,
      () => {
        parsed.command = { command: "last-tag" };
      },
    )
    .command(
      "commits-since <tag> <ref>",
      "Print the number of commits between <tag> and <ref>",
      (y) =>
        y
          .positional("tag", { type: "string", demandOption: true })
          .positional("ref", { type: "string", demandOption: true }),
      (a) => {
        parsed.command = { command: "commits-since", tag: a.tag, ref: a.ref };
      },
    )
    .demandCommand(1, "A command is required")
    .strict()
    .fail((message, error) => {
      throw error instanceof Error ? error : new Error(message);
    })
    .help()
    .alias("help", "h")
    .parseSync();

  if (!parsed.command) {
    throw new Error("A command is required");
  }

  return {
    command: parsed.command,
    options: {
      config: argv.config,
      dir: argv.dir,
      yes: argv.yes,
      debug: argv.debug,
    },
  };
}
