import { describe, expect, test } from "vitest";
import { ConfigError, loadConfig } from "../src/configs";

describe("loadConfig", () => {
  test("applies defaults", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", registerBuiltins: true });
  });

  test("reads overrides", () => {
    expect(
      loadConfig({ COMMAND_ARGS_LOG_LEVEL: "debug", COMMAND_ARGS_REGISTER_BUILTINS: "No" })
    ).toEqual({ logLevel: "debug", registerBuiltins: false });
  });

  test("treats a blank boolean as unset", () => {
    expect(loadConfig({ COMMAND_ARGS_REGISTER_BUILTINS: "  " }).registerBuiltins).toBe(true);
  });

  test("rejects invalid values", () => {
    expect(() => loadConfig({ COMMAND_ARGS_LOG_LEVEL: "loud" })).toThrow(ConfigError);
    expect(() => loadConfig({ COMMAND_ARGS_REGISTER_BUILTINS: "maybe" })).toThrowError(
      /COMMAND_ARGS_REGISTER_BUILTINS: Expected one of '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'/
    );
  });
});
