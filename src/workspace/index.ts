export {
  WORKSPACE_MARKERS,
  isWorkspaceRoot,
  detectWorkspaceRoot,
  detectProjectType,
  ignorePatterns,
} from "./detector.js";
export type { ProjectType } from "./detector.js";
