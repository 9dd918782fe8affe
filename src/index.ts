#!/usr/bin/env node
import { CommanderError } from "@commander-js/extra-typings";
import chalk from "chalk";
import { type Writable } from "stream";
import { EXIT_CODE_USAGE, TermclipError, UserInputError } from "./errors.js";
import { termclip } from "./termclip.js";

/**
 * Prints a failed run's error and returns the exit code it maps to.
 */
export function reportError(error: unknown, stderr: Writable = process.stderr): number {
  if (error instanceof TermclipError) {
    stderr.write(`${chalk.red("termclip:")} ${error.message}\n`);
    return error.exitCode;
  }
  if (error instanceof CommanderError) {
    // commander has already printed its own message.
    return error.exitCode;
  }
  if (error instanceof UserInputError) {
    // Omit stack trace for UserInputErrors
    stderr.write(`${chalk.red("termclip:")} ${error.message}\n`);
  } else if (error instanceof Error) {
    stderr.write(`${error.stack ?? error.message}\n`);
  } else {
    stderr.write(`${String(error)}\n`);
  }
  return EXIT_CODE_USAGE;
}

if (require.main === module) {
  termclip.parseAsync(process.argv).catch((error: unknown) => {
    process.exit(reportError(error));
  });
}
