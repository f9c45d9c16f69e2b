import type { ParsedArgs } from "../config/cli.js";
import type { TramSession } from "../session.js";
import type { WatchSource } from "../config/watch-source.js";

export interface CommandContext {
  session: TramSession;
  args: ParsedArgs;
  env: NodeJS.ProcessEnv;
  /** Writes one block of command output */
  output: (text: string) => void;
  /** Aborted when the process is asked to stop */
  signal: AbortSignal;
  /** File-watch implementation for the watch command; chokidar when unset */
  watchSource?: WatchSource;
}
