import type { CommandName } from "../config/cli.js";
import { runConfigCommand } from "./config.js";
import { runWatchCommand } from "./watch.js";
import { runWorkspaceCommand } from "./workspace.js";
import type { CommandContext } from "./types.js";

export type { CommandContext } from "./types.js";
export { createLoggingHandler } from "./watch.js";

const COMMAND_HANDLERS: Record<CommandName, (ctx: CommandContext) => Promise<void>> = {
  config: runConfigCommand,
  watch: runWatchCommand,
  workspace: runWorkspaceCommand,
};

export function runCommand(command: CommandName, ctx: CommandContext): Promise<void> {
  ctx.session.logger.debug({ command }, "Running command");
  return COMMAND_HANDLERS[command](ctx);
}
