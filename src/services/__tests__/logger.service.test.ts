import { describe, expect, it, vi } from "vitest";

import { Logger } from "../logger.service";

import type { LogLevel } from "../logger.service";

describe("Logger", () => {
  function capture(debug = false): { logger: Logger; output: Array<[string, LogLevel]> } {
    const output: Array<[string, LogLevel]> = [];
    const logger = new Logger({ debug, outputFn: (message, level) => output.push([message, level]) });
    return { logger, output };
  }

  it("should prefix info messages with ci:", () => {
    const { logger, output } = capture();

    logger.info("Pushed to: org/docs gh-pages");

    expect(output).toEqual([["ci: Pushed to: org/docs gh-pages", "info"]]);
  });

  it("should label warnings and errors", () => {
    const { logger, output } = capture();

    logger.warn("disk almost full");
    logger.error("push failed:", new Error("remote hung up"));
    logger.error("plain failure");

    expect(output).toEqual([
      ["ci: warning: disk almost full", "warn"],
      ["ci: error: push failed: remote hung up", "error"],
      ["ci: error: plain failure", "error"],
    ]);
  });

  it("should stringify non-Error causes", () => {
    const { logger, output } = capture();

    logger.error("failed with", 128);

    expect(output).toEqual([["ci: error: failed with 128", "error"]]);
  });

  it("should substitute %s placeholders in order", () => {
    const { logger, output } = capture();

    logger.info("Sparse checkout of %s in %s", "site", "/tmp/docs");

    expect(output).toEqual([["ci: Sparse checkout of site in /tmp/docs", "info"]]);
  });

  it("should drop debug output unless enabled", () => {
    const quiet = capture();
    const verbose = capture(true);

    quiet.logger.debug("hidden");
    verbose.logger.debug("shown %s", 1);

    expect(quiet.output).toEqual([]);
    expect(verbose.output).toEqual([["ci: debug: shown 1", "debug"]]);
  });

  it("should use a custom prefix", () => {
    const output: string[] = [];
    const logger = new Logger({ prefix: "release", outputFn: (message) => output.push(message) });

    logger.info("ready");

    expect(output).toEqual(["release: ready"]);
  });

  it("should write errors to stderr without an output function", () => {
    const logger = Logger.createDefault();

    logger.error("missing env var");
    logger.info("done");

    expect(console.error).toHaveBeenCalledWith("ci: error: missing env var");
    expect(console.log).toHaveBeenCalledWith("ci: done");
  });

  it("should surround tables with blank lines", () => {
    const log = vi.mocked(console.log);
    const logger = new Logger();

    logger.table("| a |");

    expect(log).toHaveBeenCalledWith("\n| a |\n");
  });
});
