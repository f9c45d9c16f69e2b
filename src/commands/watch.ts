import { resolveOverrides, toConfigFile } from "../config/loader.js";
import { ConfigWatcher, type ChangeHandler } from "../config/watcher.js";
import type { Logger } from "../utils/logger.js";
import type { CommandContext } from "./types.js";

/**
 * Change handler that reports reloads through the session logger
 */
export function createLoggingHandler(logger: Logger): ChangeHandler {
  return {
    onChange(store) {
      logger.info({ config: toConfigFile(store) }, "Configuration reloaded successfully");
    },
    onError(error) {
      logger.warn(
        { path: error.path, reason: error.failure.code },
        `Configuration reload failed: ${error.failure.message}`
      );
      logger.warn("Continuing with previous configuration");
    },
  };
}

function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Reload configuration whenever a watched file changes, until the signal aborts.
 * Reloaded files get the same env and CLI overrides as the initial load.
 */
export async function runWatchCommand(ctx: CommandContext): Promise<void> {
  const { session, args, env, output, signal } = ctx;

  const watcher = await ConfigWatcher.start(session.config, {
    watchPaths: session.sourcePath ? [session.sourcePath] : undefined,
    cwd: session.cwd,
    logger: session.logger,
    handler: createLoggingHandler(session.logger),
    source: ctx.watchSource,
    overlay: (store) =>
      resolveOverrides(store, { cliOverrides: args.cliConfig, cwd: session.cwd, env }),
  });

  output("Watch mode started. Press Ctrl+C to stop.");
  try {
    await waitForAbort(signal);
  } finally {
    await watcher.stop();
  }
  output("Watch mode stopped.");
}
