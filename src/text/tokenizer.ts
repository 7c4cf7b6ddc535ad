import { TokenizeError } from "../commands/errors";

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  '"': '"',
  "\\": "\\",
};

/**
 * Splits command text into raw tokens.
 * - whitespace separates tokens
 * - "double quotes" group words and honour backslash escapes
 * - 'single quotes' group words literally
 * Quotes in the middle of a word join onto it: a"b c" is one token.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let position = 0;

  while (position < input.length) {
    const char = input[position];

    if (/\s/.test(char)) {
      if (inToken) tokens.push(current);
      current = "";
      inToken = false;
      position++;
      continue;
    }

    inToken = true;
    if (char === '"' || char === "'") {
      const quoted = readQuoted(input, position);
      current += quoted.value;
      position = quoted.end;
      continue;
    }

    current += char;
    position++;
  }

  if (inToken) tokens.push(current);
  return tokens;
}

function readQuoted(input: string, start: number): { value: string; end: number } {
  const quote = input[start];
  let value = "";
  let position = start + 1;

  while (position < input.length) {
    const char = input[position];
    if (char === quote) return { value, end: position + 1 };

    if (quote === '"' && char === "\\" && position + 1 < input.length) {
      const next = input[position + 1];
      value += ESCAPES[next] ?? next;
      position += 2;
      continue;
    }

    value += char;
    position++;
  }

  throw new TokenizeError(`Unterminated ${quote === '"' ? "double" : "single"} quote at position ${start}`, start);
}
