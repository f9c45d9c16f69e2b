import type pino from "pino";
import { helpText, parseArgs, versionText } from "./config/cli.js";
import { loadConfig } from "./config/loader.js";
import type { WatchSource } from "./config/watch-source.js";
import { runCommand } from "./commands/index.js";
import { toTramError } from "./errors/index.js";
import { TramSession } from "./session.js";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface RunCliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  signal?: AbortSignal;
  logDestination?: pino.DestinationStream;
  watchSource?: WatchSource;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * Run the CLI once and return the process exit code.
 * Load-time and command errors end here as a message on stderr.
 */
export async function runCli(
  argv: readonly string[],
  options: RunCliOptions = {}
): Promise<number> {
  const io = options.io ?? processIo;
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  try {
    const args = parseArgs(argv);
    if (args.showHelp) {
      io.stdout(helpText());
      return 0;
    }
    if (args.showVersion) {
      io.stdout(versionText());
      return 0;
    }

    const loaded = await loadConfig({
      configPath: args.configPath,
      cliOverrides: args.cliConfig,
      cwd,
      env,
    });

    const session = new TramSession(loaded, { cwd, logDestination: options.logDestination });
    await session.startup();
    try {
      await runCommand(args.command, {
        session,
        args,
        env,
        output: io.stdout,
        signal: options.signal ?? new AbortController().signal,
        watchSource: options.watchSource,
      });
    } finally {
      await session.shutdown();
    }
    return 0;
  } catch (error) {
    const tramError = toTramError(error, "run command");
    io.stderr(tramError.toUserMessage());
    return tramError.exitCode;
  }
}
