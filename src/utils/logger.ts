import pino from "pino";
import type { ConfigStore, LogLevel } from "../config/schema.js";

export type LogFormat = "json" | "pretty";

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  color: boolean;
  /** Write log lines here instead of stderr (disables the pretty transport) */
  destination?: pino.DestinationStream;
  enabled?: boolean;
}

const STDERR = 2;

// Create the underlying pino instance
function createPino(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    enabled: config.enabled ?? true,
    // Base context that will be included in every log
    base: {
      service: "tram",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.destination) {
    return pino(options, config.destination);
  }

  if (config.format === "pretty") {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: config.color,
          destination: STDERR,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname,service",
          singleLine: false,
          messageFormat: "{msg}",
        },
      },
    });
  }

  return pino(options, pino.destination(STDERR));
}

// Logger wrapper passed down from the session to everything that logs
export class Logger {
  private logger: pino.Logger;

  constructor(config: LoggerConfig | pino.Logger) {
    this.logger = isPino(config) ? config : createPino(config);
  }

  debug(msg: string): void;
  debug(obj: object, msg: string): void;
  debug(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.debug(msgOrObj);
    } else {
      this.logger.debug(msgOrObj, msg);
    }
  }

  info(msg: string): void;
  info(obj: object, msg: string): void;
  info(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.info(msgOrObj);
    } else {
      this.logger.info(msgOrObj, msg);
    }
  }

  warn(msg: string): void;
  warn(obj: object, msg: string): void;
  warn(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.warn(msgOrObj);
    } else {
      this.logger.warn(msgOrObj, msg);
    }
  }

  error(msg: string): void;
  error(obj: object, msg: string): void;
  error(msgOrObj: string | object, msg?: string): void {
    if (typeof msgOrObj === "string") {
      this.logger.error(msgOrObj);
    } else {
      this.logger.error(msgOrObj, msg);
    }
  }

  // Scoped logger carrying extra bindings (e.g. { component: "watcher" })
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(this.logger.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  flush(): void {
    this.logger.flush();
  }
}

function isPino(value: LoggerConfig | pino.Logger): value is pino.Logger {
  return "child" in value;
}

/**
 * Observability setup for a process, called once by the session at startup.
 * JSON output formats get JSON log lines; everything else is pretty-printed.
 */
export function configureLogging(
  store: ConfigStore,
  options: { destination?: pino.DestinationStream } = {}
): Logger {
  return new Logger({
    level: store.logLevel,
    format: store.outputFormat === "json" ? "json" : "pretty",
    color: store.color,
    destination: options.destination,
  });
}

export function createSilentLogger(): Logger {
  return new Logger({ level: "error", format: "json", color: false, enabled: false });
}
