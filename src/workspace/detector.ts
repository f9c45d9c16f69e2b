import * as path from "path";
import { WorkspaceNotFoundError } from "../errors/index.js";
import { pathExists } from "../utils/fs.js";

/**
 * Files or directories whose presence marks a workspace root
 */
export const WORKSPACE_MARKERS = [
  // Version control
  ".git",
  ".hg",
  ".svn",
  // Project files
  "Cargo.toml",
  "package.json",
  "pyproject.toml",
  "setup.py",
  "go.mod",
  "build.gradle",
  "pom.xml",
  "Makefile",
  "justfile",
  ".project",
] as const;

export type ProjectType = "rust" | "nodejs" | "python" | "go" | "java" | "generic";

// Checked in order; the first type with a matching file wins
const PROJECT_TYPE_FILES: ReadonlyArray<[ProjectType, readonly string[]]> = [
  ["rust", ["Cargo.toml"]],
  ["nodejs", ["package.json"]],
  ["python", ["pyproject.toml", "setup.py"]],
  ["go", ["go.mod"]],
  ["java", ["pom.xml", "build.gradle"]],
];

const IGNORE_PATTERNS: Record<ProjectType, readonly string[]> = {
  rust: ["target/", "Cargo.lock"],
  nodejs: ["node_modules/", "dist/", "build/"],
  python: ["__pycache__/", "*.pyc", ".venv/", "venv/", "dist/", "build/"],
  go: ["vendor/"],
  java: ["target/", "build/", "*.class"],
  generic: ["build/", "dist/", "out/"],
};

async function hasAny(dir: string, names: readonly string[]): Promise<boolean> {
  for (const name of names) {
    if (await pathExists(path.join(dir, name))) {
      return true;
    }
  }
  return false;
}

export function isWorkspaceRoot(dir: string): Promise<boolean> {
  return hasAny(dir, WORKSPACE_MARKERS);
}

/**
 * Walk up from `startDir` to the nearest directory holding a workspace marker
 */
export async function detectWorkspaceRoot(startDir: string = process.cwd()): Promise<string> {
  let current = path.resolve(startDir);

  for (;;) {
    if (await isWorkspaceRoot(current)) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      throw new WorkspaceNotFoundError(startDir);
    }
    current = parent;
  }
}

export async function detectProjectType(root: string): Promise<ProjectType> {
  for (const [type, files] of PROJECT_TYPE_FILES) {
    if (await hasAny(root, files)) {
      return type;
    }
  }
  return "generic";
}

export function ignorePatterns(type: ProjectType): readonly string[] {
  return IGNORE_PATTERNS[type];
}
