import { WorkspaceNotFoundError } from "../errors/index.js";
import { renderOutput, type OutputRecord } from "../utils/output.js";
import { ignorePatterns } from "../workspace/index.js";
import type { CommandContext } from "./types.js";

export async function runWorkspaceCommand({
  session,
  args,
  output,
}: CommandContext): Promise<void> {
  const { workspaceRoot, projectType } = session;
  if (!workspaceRoot) {
    throw new WorkspaceNotFoundError(session.cwd);
  }

  const record: OutputRecord = {
    workspace_root: workspaceRoot,
    project_type: projectType,
  };
  if (args.detailed && projectType) {
    record["ignore_patterns"] = ignorePatterns(projectType);
  }

  output(renderOutput(record, session.config.outputFormat));
}
