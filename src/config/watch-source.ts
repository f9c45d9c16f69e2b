import chokidar from "chokidar";
import * as path from "path";
import type { Logger } from "../utils/logger.js";
import { getErrorMessage } from "../errors/index.js";

export type WatchEventKind = "create" | "modify" | "delete";

export interface WatchEvent {
  kind: WatchEventKind;
  /** Absolute path of the file the event is about */
  path: string;
}

export type WatchListener = (event: WatchEvent) => void;

export interface WatchSubscription {
  close(): Promise<void>;
}

/**
 * Subscribe to change events for a set of paths. All paths feed one listener.
 * Resolves once the subscription is live; rejects if it cannot be set up.
 */
export interface WatchSource {
  subscribe(paths: readonly string[], listener: WatchListener): Promise<WatchSubscription>;
}

export interface ChokidarWatchSourceOptions {
  logger?: Logger;
  /** Wait for writes to settle before reporting (ms); 0 disables */
  stabilityThreshold?: number;
}

/**
 * WatchSource backed by chokidar
 */
export class ChokidarWatchSource implements WatchSource {
  private readonly logger?: Logger;
  private readonly stabilityThreshold: number;

  constructor(options: ChokidarWatchSourceOptions = {}) {
    this.logger = options.logger;
    this.stabilityThreshold = options.stabilityThreshold ?? 200;
  }

  subscribe(paths: readonly string[], listener: WatchListener): Promise<WatchSubscription> {
    const watcher = chokidar.watch([...paths], {
      persistent: true,
      ignoreInitial: true,
      awaitWriteFinish:
        this.stabilityThreshold > 0
          ? { stabilityThreshold: this.stabilityThreshold, pollInterval: 50 }
          : false,
    });

    const emit = (kind: WatchEventKind) => (filePath: string) => {
      listener({ kind, path: path.resolve(filePath) });
    };

    watcher.on("add", emit("create"));
    watcher.on("change", emit("modify"));
    watcher.on("unlink", emit("delete"));

    return new Promise<WatchSubscription>((resolve, reject) => {
      let ready = false;

      watcher.on("error", (error: unknown) => {
        if (!ready) {
          const fail = () => reject(error);
          watcher.close().then(fail, fail);
          return;
        }
        this.logger?.error({ error: getErrorMessage(error) }, "Config watcher error");
      });

      watcher.once("ready", () => {
        ready = true;
        resolve({ close: () => watcher.close() });
      });
    });
  }
}
