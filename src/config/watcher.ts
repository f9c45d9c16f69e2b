import * as path from "path";
import { loadConfigFromFile } from "./loader.js";
import { CONFIG_FILE_CANDIDATES, type ConfigStore } from "./schema.js";
import {
  ChokidarWatchSource,
  type WatchEvent,
  type WatchSource,
  type WatchSubscription,
} from "./watch-source.js";
import {
  ConfigReloadError,
  WatchSetupError,
  getErrorMessage,
  toTramError,
} from "../errors/index.js";
import { isFile } from "../utils/fs.js";
import { createSilentLogger, type Logger } from "../utils/logger.js";

/**
 * Receives the outcome of every reload. Called after the watcher's state
 * already reflects the event.
 */
export interface ChangeHandler {
  onChange(store: ConfigStore): void | Promise<void>;
  onError(error: ConfigReloadError): void | Promise<void>;
}

export interface ConfigWatcherOptions {
  /** Files to watch; defaults to the conventional config files in `cwd` */
  watchPaths?: readonly string[];
  cwd?: string;
  handler?: ChangeHandler;
  logger?: Logger;
  /** File-watch implementation; defaults to chokidar */
  source?: WatchSource;
  /** Applied to every reloaded file before it replaces the current config */
  overlay?: (store: ConfigStore) => ConfigStore;
}

/**
 * Configuration holder with hot reload support.
 *
 * One loop consumes the events of all watched files in arrival order. A
 * failed reload leaves the last good configuration in place.
 */
export class ConfigWatcher {
  private currentConfig: ConfigStore;
  private readonly watchPaths: readonly string[];
  private readonly handler?: ChangeHandler;
  private readonly logger: Logger;
  private readonly overlay?: (store: ConfigStore) => ConfigStore;

  private readonly abort = new AbortController();
  private readonly queue: WatchEvent[] = [];
  private wake: (() => void) | null = null;
  private subscription: WatchSubscription | null = null;
  private loop: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;

  private constructor(
    initialConfig: ConfigStore,
    watchPaths: readonly string[],
    options: ConfigWatcherOptions
  ) {
    this.currentConfig = initialConfig;
    this.watchPaths = watchPaths;
    this.handler = options.handler;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "config-watcher" });
    this.overlay = options.overlay;
  }

  /**
   * Start watching every existing path of the watch set.
   * Rejects with WatchSetupError if the subscription cannot be established.
   */
  static async start(
    initialConfig: ConfigStore,
    options: ConfigWatcherOptions = {}
  ): Promise<ConfigWatcher> {
    const cwd = options.cwd ?? process.cwd();
    const requested: readonly string[] =
      options.watchPaths && options.watchPaths.length > 0
        ? options.watchPaths
        : CONFIG_FILE_CANDIDATES;
    const candidates = [...new Set(requested.map((p) => path.resolve(cwd, p)))];

    const existing: string[] = [];
    for (const candidate of candidates) {
      if (await isFile(candidate)) {
        existing.push(candidate);
      }
    }

    const watcher = new ConfigWatcher(initialConfig, existing, options);
    const source = options.source ?? new ChokidarWatchSource({ logger: options.logger });
    await watcher.subscribe(source, candidates);
    watcher.loop = watcher.runLoop();
    return watcher;
  }

  private async subscribe(source: WatchSource, candidates: readonly string[]): Promise<void> {
    if (this.watchPaths.length === 0) {
      this.logger.warn(
        { candidates },
        "No config files found to watch, serving the initial configuration"
      );
      return;
    }

    try {
      this.subscription = await source.subscribe(this.watchPaths, (event) => this.enqueue(event));
    } catch (error) {
      throw new WatchSetupError(getErrorMessage(error), error instanceof Error ? error : undefined);
    }

    this.logger.info({ paths: this.watchPaths }, "Config watcher started");
  }

  /**
   * Snapshot of the current configuration
   */
  current(): ConfigStore {
    return Object.freeze({ ...this.currentConfig });
  }

  /**
   * Paths with an active subscription
   */
  getWatchedPaths(): string[] {
    return [...this.watchPaths];
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  /**
   * Stop the loop and release the subscription. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Resolves once the watch loop has exited
   */
  done(): Promise<void> {
    return this.loop;
  }

  private async shutdown(): Promise<void> {
    this.abort.abort();
    this.queue.length = 0;
    this.wake?.();

    const subscription = this.subscription;
    this.subscription = null;
    try {
      await subscription?.close();
    } finally {
      await this.loop;
    }

    this.logger.info("Config watcher stopped");
  }

  private enqueue(event: WatchEvent): void {
    if (this.abort.signal.aborted) {
      return;
    }
    this.queue.push(event);
    this.wake?.();
  }

  // Next queued event, or null once stopped. Stop wins over queued events.
  private async nextEvent(): Promise<WatchEvent | null> {
    while (!this.abort.signal.aborted) {
      const event = this.queue.shift();
      if (event) {
        return event;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
      this.wake = null;
    }
    return null;
  }

  private async runLoop(): Promise<void> {
    for (let event = await this.nextEvent(); event; event = await this.nextEvent()) {
      if (!this.isReloadTrigger(event)) {
        this.logger.debug({ kind: event.kind, path: event.path }, "Ignoring file event");
        continue;
      }
      await this.reload(event.path);
    }
  }

  private isReloadTrigger(event: WatchEvent): boolean {
    return (
      (event.kind === "modify" || event.kind === "create") &&
      this.watchPaths.includes(path.resolve(event.path))
    );
  }

  private async reload(filePath: string): Promise<void> {
    this.logger.debug({ path: filePath }, "Config file changed, reloading...");

    let next: ConfigStore;
    try {
      const loaded = await loadConfigFromFile(filePath);
      next = this.overlay ? this.overlay(loaded) : loaded;
    } catch (error) {
      if (this.abort.signal.aborted) {
        return;
      }
      const failure = new ConfigReloadError(
        filePath,
        toTramError(error, "reload config", filePath)
      );
      this.logger.warn(
        { path: filePath, reason: failure.failure.code, error: failure.failure.message },
        "Failed to reload config, keeping previous configuration"
      );
      await this.notify("onError", () => this.handler?.onError(failure));
      return;
    }

    // A reload that finishes after stop() is discarded
    if (this.abort.signal.aborted) {
      return;
    }

    this.currentConfig = next;
    this.logger.info({ path: filePath }, "Config successfully reloaded");
    await this.notify("onChange", () => this.handler?.onChange(next));
  }

  private async notify(
    callback: keyof ChangeHandler,
    invoke: () => void | Promise<void> | undefined
  ): Promise<void> {
    try {
      await invoke();
    } catch (error) {
      this.logger.error(
        { callback, error: getErrorMessage(error) },
        "Config change handler failed"
      );
    }
  }
}

/**
 * Create and start a config watcher
 */
export function createConfigWatcher(
  initialConfig: ConfigStore,
  handler: ChangeHandler,
  options: Omit<ConfigWatcherOptions, "handler"> = {}
): Promise<ConfigWatcher> {
  return ConfigWatcher.start(initialConfig, { ...options, handler });
}
