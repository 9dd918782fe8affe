import { Command, Option, type HelpConfiguration } from "@commander-js/extra-typings";
import chalk from "chalk";
import { type Readable, type Writable } from "stream";
import { copyToClipboard, pasteFromClipboard } from "./clipboard.js";
import { type EnvSnapshot, readConfig } from "./config.js";
import { probeEnvironment } from "./environment.js";
import { readPayload } from "./io.js";
import { addLogLevelOptions, applyDebugEnv, createLogger } from "./logLevel.js";
import { openTerminalSink, type TerminalSinkOpener } from "./osc52/terminalSink.js";
import { type SelectorDeps } from "./selector.js";
import { type CommandRunner, runCommand } from "./transports/runCommand.js";
import { getVersion } from "./version.js";

const HELP_MESSAGE_PADDING_LEFT = 1;
const HELP_MESSAGE_MAX_WIDTH = 100;
const HELP_MESSAGE_GAP = 4;

const helpConfiguration: HelpConfiguration = {
  helpWidth: HELP_MESSAGE_MAX_WIDTH,
  commandUsage: command => chalk.bold(`${command.name()} ${command.usage()}`),
  optionTerm: (option: { flags: string }) =>
    chalk.cyan(
      `${" ".repeat(HELP_MESSAGE_PADDING_LEFT)}${option.flags.padEnd(
        option.flags.length + HELP_MESSAGE_GAP,
      )}`,
    ),
  optionDescription: (option: { description?: string }) => option.description ?? "",
};

const ENVIRONMENT_HELP = `
${chalk.bold("Environment:")}
 ${chalk.cyan("TERMCLIP_FORCE_OSC52=1")}      Only use the OSC 52 terminal escape sequence
 ${chalk.cyan("TERMCLIP_FORCE_NATIVE=1")}     Only use native clipboard tools (loses to FORCE_OSC52)
 ${chalk.cyan("TERMCLIP_OSC52_MAX_B64=<n>")}  Largest base64 payload sent over OSC 52 (default 75000)
 ${chalk.cyan("TERMCLIP_TIMEOUT_MS=<n>")}     How long a native tool may run (default 5000)
 ${chalk.cyan("TERMCLIP_DEBUG=1")}            Same as --verbose

Native tools are tried first: pbcopy, clip and powershell, wl-copy, xclip and xsel. Without one,
the payload is sent to the terminal as ESC ] 52 ; c ; <base64> BEL, wrapped for tmux or screen.

${chalk.bold("Exit codes:")} 0 copied or pasted, 1 usage error, 2 every transport failed,
3 paste is not possible here.

${chalk.bold("Examples:")}
 echo "hello" | termclip
 termclip --paste > notes.txt`;

/**
 * Everything the command touches outside of itself.
 */
export interface TermclipRuntime {
  env: EnvSnapshot;
  platform: NodeJS.Platform;
  runner: CommandRunner;
  openSink: TerminalSinkOpener;
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  exit: (code: number) => never;
}

export function createTermclipCommand(runtime: TermclipRuntime) {
  const command = new Command()
    .name("termclip")
    .description(
      "Copy standard input to the clipboard: locally, over SSH, and inside tmux or screen.",
    )
    .option("--paste", "Write the clipboard contents to standard output (local clipboards only)")
    .addOption(new Option("-v, --version", "Print the version of termclip"));

  const termclip = addLogLevelOptions(command);

  termclip.configureHelp(helpConfiguration);
  termclip.configureOutput({
    writeOut: str => runtime.stdout.write(str),
    writeErr: str => runtime.stderr.write(str),
  });
  termclip.addHelpText("after", ENVIRONMENT_HELP);
  termclip.on("option:version", () => {
    runtime.stdout.write(`${getVersion()}\n`);
    runtime.exit(0);
  });

  termclip.action(async options => {
    const config = readConfig(runtime.env);
    const logger = createLogger(applyDebugEnv(options, config.debug), runtime.stderr);
    const context = probeEnvironment(runtime.platform, runtime.env, config);
    logger.debug(
      `Environment: os=${context.os} multiplexer=${context.multiplexer}`,
      `x11=${context.hasX11Display} wsl=${context.wsl}`,
    );

    const deps: SelectorDeps = { runner: runtime.runner, openSink: runtime.openSink, logger };
    if (options.paste === true) {
      await pasteFromClipboard(context, deps, runtime.stdout);
      return;
    }
    const payload = await readPayload(runtime.stdin);
    await copyToClipboard(payload, context, deps);
  });

  return termclip;
}

export const termclip = createTermclipCommand({
  env: process.env,
  platform: process.platform,
  runner: runCommand,
  openSink: () => openTerminalSink(),
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  exit: code => process.exit(code),
});
