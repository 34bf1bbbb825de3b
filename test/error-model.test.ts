import { describe, expect, it } from "vitest";

import {
  ConfigError,
  ERROR_EXIT_CODES,
  ExecutionError,
  isCommanderInfoExit,
  UserInputError,
  normalizeError,
  normalizeOutputFormat,
  resolveOutputFormatFromArgv,
  toJsonErrorPayload
} from "../src/core/errors.js";

describe("error model", () => {
  it("maps user input errors to exit code 2", () => {
    const error = normalizeError(new UserInputError("bad input"));
    expect(error.code).toBe("USER_INPUT");
    expect(error.exitCode).toBe(2);
  });

  it("maps config errors to exit code 2", () => {
    const error = new ConfigError("broken config", { details: { configPath: "cfg.json" } });
    expect(error.code).toBe("CONFIG");
    expect(error.exitCode).toBe(2);
    expect(error.name).toBe("ConfigError");
    expect(ERROR_EXIT_CODES.EXECUTION).toBe(1);
  });

  it("maps commander errors to user input errors", () => {
    const commanderError = Object.assign(new Error("error: missing required argument 'kind'"), {
      code: "commander.missingArgument"
    });
    const error = normalizeError(commanderError);
    expect(error).toBeInstanceOf(UserInputError);
    expect(error.message).toBe("missing required argument 'kind'");
    expect(error.details).toEqual({ commanderCode: "commander.missingArgument" });
  });

  it("recognizes help and version exits", () => {
    expect(isCommanderInfoExit({ code: "commander.helpDisplayed" })).toBe(true);
    expect(isCommanderInfoExit({ code: "commander.version" })).toBe(true);
    expect(isCommanderInfoExit({ code: "commander.unknownOption" })).toBe(false);
    expect(isCommanderInfoExit(new Error("boom"))).toBe(false);
  });

  it("maps unknown runtime errors to execution exit code 1", () => {
    const error = normalizeError(new Error("boom"));
    expect(error).toBeInstanceOf(ExecutionError);
    expect(error.exitCode).toBe(1);
    expect(normalizeError("plain string").message).toBe("plain string");
  });

  it("validates output format values", () => {
    expect(normalizeOutputFormat("json")).toBe("json");
    expect(normalizeOutputFormat(" TEXT ")).toBe("text");
    expect(normalizeOutputFormat(undefined)).toBe("text");
    expect(() => normalizeOutputFormat("yaml")).toThrow('Invalid --format value "yaml". Expected "text" or "json".');
  });

  it("finds the output format in raw argv", () => {
    expect(resolveOutputFormatFromArgv(["build", "--format", "json"])).toBe("json");
    expect(resolveOutputFormatFromArgv(["parse", "test", "--format=JSON"])).toBe("json");
    expect(resolveOutputFormatFromArgv(["watch", "--", "tool", "--format", "json"])).toBe("text");
    expect(resolveOutputFormatFromArgv(["test"])).toBe("text");
  });

  it("renders machine-readable JSON error payloads", () => {
    expect(toJsonErrorPayload(new UserInputError("invalid value"))).toEqual({
      error: {
        code: "USER_INPUT",
        type: "UserInputError",
        message: "invalid value",
        exitCode: 2
      }
    });
    expect(toJsonErrorPayload(new ConfigError("bad", { details: { configPath: "cfg.json" } }))).toEqual({
      error: {
        code: "CONFIG",
        type: "ConfigError",
        message: "bad",
        exitCode: 2,
        details: { configPath: "cfg.json" }
      }
    });
  });
});
