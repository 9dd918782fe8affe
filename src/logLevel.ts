import { Option, type Command, type OptionValues } from "@commander-js/extra-typings";
import { makePrettyError, SimpleLogger, text } from "@lmstudio/lms-common";
import chalk from "chalk";
import { Console } from "console";
import { type Writable } from "stream";

const levels = ["debug", "info", "warn", "error", "none"] as const;

export type LogLevel = (typeof levels)[number];

/**
 * Adds the hidden log level options to a commander.js command.
 */
export function addLogLevelOptions<
  Args extends Array<unknown>,
  Opts extends OptionValues,
  GlobalOpts extends OptionValues,
>(command: Command<Args, Opts, GlobalOpts>) {
  return command
    .addOption(
      new Option("--log-level <level>", "The level of logging to use").choices(levels).hideHelp(),
    )
    .addOption(new Option("--quiet", "Suppress all logging").hideHelp())
    .addOption(
      new Option("--verbose", "Log every transport attempt and why it failed").hideHelp(),
    );
}

export interface LogLevelArgs {
  logLevel?: LogLevel;
  verbose?: boolean;
  quiet?: boolean;
}

export interface LogLevelMap {
  debug: boolean;
  info: boolean;
  warn: boolean;
  error: boolean;
}

export function getLogLevelMap({
  logLevel,
  verbose = false,
  quiet = false,
}: LogLevelArgs): LogLevelMap {
  let numSpecified = 0;
  if (logLevel !== undefined) {
    numSpecified++;
  }
  if (verbose) {
    numSpecified++;
  }
  if (quiet) {
    numSpecified++;
  }
  if (numSpecified > 1) {
    throw makePrettyError(
      chalk.red(text`
        Only one of ${chalk.yellow("--log-level")}, ${chalk.yellow("--verbose")}, or
        ${chalk.yellow("--quiet")} can be specified.
      `),
    );
  }
  if (quiet) {
    logLevel = "none";
  }
  if (verbose) {
    logLevel = "debug";
  }
  const level = levels.indexOf(logLevel ?? "info");
  return {
    debug: level <= levels.indexOf("debug"),
    info: level <= levels.indexOf("info"),
    warn: level <= levels.indexOf("warn"),
    error: level <= levels.indexOf("error"),
  };
}

/**
 * `TERMCLIP_DEBUG=1` behaves like `--verbose` unless a level was given on the command line.
 */
export function applyDebugEnv(args: LogLevelArgs, debugEnv: boolean): LogLevelArgs {
  if (!debugEnv || args.logLevel !== undefined || args.quiet === true) {
    return args;
  }
  return { ...args, verbose: true };
}

/**
 * Every level goes to stderr: stdout carries pasted clipboard content.
 */
export function createLogger(
  { logLevel, verbose, quiet }: LogLevelArgs,
  stream: Writable = process.stderr,
): SimpleLogger {
  const console = new Console({
    stdout: stream,
    stderr: stream,
  });
  const levelMap = getLogLevelMap({ logLevel, verbose, quiet });
  const consoleObj = {
    debug: levelMap.debug ? console.debug : () => {},
    info: levelMap.info ? console.info : () => {},
    warn: levelMap.warn ? console.warn : () => {},
    error: levelMap.error ? console.error : () => {},
  };
  return new SimpleLogger("", consoleObj, {
    useLogLevelPrefixes: true,
    infoPrefix: verbose === true || logLevel === "debug" ? undefined : null,
    errorPrefix: chalk.red("Error:"),
  });
}
