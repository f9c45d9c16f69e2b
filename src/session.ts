import type pino from "pino";
import { toConfigFile, type LoadedConfig } from "./config/loader.js";
import type { ConfigStore } from "./config/schema.js";
import { WorkspaceNotFoundError } from "./errors/index.js";
import { configureLogging, createSilentLogger, type Logger } from "./utils/logger.js";
import { detectProjectType, detectWorkspaceRoot, type ProjectType } from "./workspace/index.js";

export interface SessionOptions {
  cwd?: string;
  /** Log destination; stderr when unset */
  logDestination?: pino.DestinationStream;
}

/**
 * Application session: owns the loaded configuration, the logger and the
 * detected workspace for the lifetime of one command.
 */
export class TramSession {
  readonly config: ConfigStore;
  readonly sourcePath: string | null;
  readonly cwd: string;

  logger: Logger = createSilentLogger();
  workspaceRoot: string | null = null;
  projectType: ProjectType | null = null;

  private readonly logDestination?: pino.DestinationStream;

  constructor(loaded: LoadedConfig, options: SessionOptions = {}) {
    this.config = loaded.store;
    this.sourcePath = loaded.sourcePath;
    this.cwd = options.cwd ?? process.cwd();
    this.logDestination = options.logDestination;
  }

  async startup(): Promise<void> {
    // Logging first, everything after this can log
    this.logger = configureLogging(this.config, { destination: this.logDestination });

    this.logger.info("Starting tram");
    this.logger.debug(
      { config: toConfigFile(this.config), source: this.sourcePath },
      "Configuration loaded"
    );

    try {
      const root = this.config.workspaceRoot ?? (await detectWorkspaceRoot(this.cwd));
      this.workspaceRoot = root;
      this.projectType = await detectProjectType(root);
      this.logger.info({ root, projectType: this.projectType }, `Working in ${root} workspace`);
    } catch (error) {
      if (!(error instanceof WorkspaceNotFoundError)) {
        throw error;
      }
      this.logger.debug({ cwd: this.cwd }, "No workspace detected");
    }
  }

  async shutdown(): Promise<void> {
    this.logger.debug("Shutting down");
    this.logger.flush();
  }
}
