import { describe, expect, test } from "vitest";
import { TokenizeError } from "../src/commands/errors";
import { tokenize } from "../src/text/tokenizer";

describe("tokenize", () => {
  test("splits on whitespace", () => {
    expect(tokenize("  roll  2\td6 ")).toEqual(["roll", "2", "d6"]);
  });

  test("groups quoted words", () => {
    expect(tokenize('say "big dice" \'small dice\'')).toEqual(["say", "big dice", "small dice"]);
  });

  test("honours escapes only inside double quotes", () => {
    expect(tokenize('say "a \\"b\\"\\n"')).toEqual(["say", 'a "b"\n']);
    expect(tokenize("path 'c:\\temp'")).toEqual(["path", "c:\\temp"]);
  });

  test("joins quotes onto adjacent text", () => {
    expect(tokenize('key="some value"')).toEqual(["key=some value"]);
  });

  test("keeps empty quoted tokens", () => {
    expect(tokenize('set name ""')).toEqual(["set", "name", ""]);
  });

  test("returns no tokens for blank input", () => {
    expect(tokenize("")).toEqual([]);
    expect(tokenize("   ")).toEqual([]);
  });

  test("rejects an unterminated quote", () => {
    expect(() => tokenize('echo "oops')).toThrow(TokenizeError);
    expect(() => tokenize('echo "oops')).toThrowError("Unterminated double quote at position 5");
  });
});
