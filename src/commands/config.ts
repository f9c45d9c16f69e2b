import { toConfigFile } from "../config/loader.js";
import { renderOutput } from "../utils/output.js";
import type { CommandContext } from "./types.js";

/**
 * Print the resolved configuration and where it came from
 */
export async function runConfigCommand({ session, output }: CommandContext): Promise<void> {
  const { config, sourcePath } = session;
  output(renderOutput({ ...toConfigFile(config), source: sourcePath }, config.outputFormat));
}
