import { describe, expect, it } from "vitest";
import {
  ConfigNotFoundError,
  ConfigParseError,
  ConfigReloadError,
  ErrorCode,
  InvalidArgumentError,
  InvalidValueError,
  OperationFailedError,
  TramError,
  UnsupportedFormatError,
  WatchSetupError,
  getErrorSummary,
  logError,
  toTramError,
} from "../../src/errors/index.js";
import { createCapturingLogger } from "../helpers/capture-logger.js";

describe("TramError", () => {
  it("renders the message with its suggestion", () => {
    expect(new ConfigNotFoundError("/srv/tram.json").toUserMessage()).toBe(
      "Error: Configuration file not found: /srv/tram.json\n" +
        "  help: Check the --config path, or run with --help to see configuration options."
    );
  });

  it("renders a message without a suggestion on one line", () => {
    expect(new InvalidValueError("color", "maybe").toUserMessage()).toBe(
      "Error: Invalid color: maybe"
    );
  });

  it("maps argument errors to exit code 2 and everything else to 1", () => {
    expect(new InvalidArgumentError("--bogus", "unknown flag").exitCode).toBe(2);
    expect(new ConfigNotFoundError("/a").exitCode).toBe(1);
    expect(new WatchSetupError("no inotify").exitCode).toBe(1);
  });

  it("names the unsupported extension", () => {
    expect(new UnsupportedFormatError("/a/tram.ini", ".ini").message).toBe(
      "Unsupported config file format: .ini"
    );
    expect(new UnsupportedFormatError("/a/tram", "").message).toBe(
      "Unsupported config file format: (no extension)"
    );
  });

  it("wraps the underlying failure of a reload", () => {
    const failure = new ConfigParseError("/a/tram.json", "json", "Unexpected end of JSON input");
    const error = new ConfigReloadError("/a/tram.json", failure);

    expect(error.message).toBe(
      "Configuration reload failed for /a/tram.json: " +
        "Failed to parse JSON config file /a/tram.json: Unexpected end of JSON input"
    );
    expect(error.code).toBe(ErrorCode.RELOAD_FAILED);
    expect(error.failure).toBe(failure);
    expect(error.isUserError()).toBe(true);
  });

  it("separates user errors from internal failures", () => {
    expect(new InvalidValueError("log_level", "loud").isUserError()).toBe(true);
    expect(new OperationFailedError("watch", "boom").isUserError()).toBe(false);
  });
});

describe("toTramError", () => {
  it("passes tram errors through", () => {
    const error = new InvalidArgumentError("--x", "unknown flag");
    expect(toTramError(error, "parse")).toBe(error);
  });

  it("turns ENOENT into ConfigNotFoundError", () => {
    const enoent = Object.assign(new Error("ENOENT: no such file or directory"), {
      code: "ENOENT",
    });

    const error = toTramError(enoent, "read config file", "/etc/tram.toml");
    expect(error).toBeInstanceOf(ConfigNotFoundError);
    expect(error.message).toBe("Configuration file not found: /etc/tram.toml");
  });

  it("wraps other system errors by code", () => {
    const eacces = Object.assign(new Error("EACCES: permission denied"), { code: "EACCES" });

    const error = toTramError(eacces, "read config file", "/etc/tram.toml");
    expect(error).toBeInstanceOf(OperationFailedError);
    expect(error.message).toBe("Operation failed: read config file - EACCES");
  });

  it("wraps plain errors and thrown values", () => {
    expect(toTramError(new Error("boom"), "run command").message).toBe(
      "Operation failed: run command - boom"
    );
    expect(toTramError("bad", "run command").message).toBe("Operation failed: run command - bad");
  });
});

describe("logError", () => {
  it("logs user errors as warnings", () => {
    const { logger, lines } = createCapturingLogger();

    logError(logger, new ConfigNotFoundError("/a.json"), { command: "config" });

    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "User error: Configuration file not found: /a.json",
      command: "config",
      errorCode: "CONFIG_NOT_FOUND",
      isUserError: true,
    });
  });

  it("logs internal failures as errors", () => {
    const { logger, lines } = createCapturingLogger();

    logError(logger, new WatchSetupError("no inotify"));

    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "System error: Failed to start config watcher: no inotify",
      errorName: "WatchSetupError",
    });
  });
});

it("summarises errors with their class name", () => {
  expect(getErrorSummary(new ConfigNotFoundError("/p"))).toBe(
    "[ConfigNotFoundError] Configuration file not found: /p"
  );
  expect(getErrorSummary(42)).toBe("42");
  expect(new TramError("x", ErrorCode.OPERATION_FAILED).name).toBe("TramError");
});
