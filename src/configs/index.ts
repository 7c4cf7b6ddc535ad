import { z } from "zod";

export const DEFAULT_LOG_LEVEL = "info";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export type EnvSource = Record<string, string | undefined>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function booleanVar(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(", ")}`,
      });
      return z.NEVER;
    });
}

const configSchema = z
  .object({
    COMMAND_ARGS_LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default(DEFAULT_LOG_LEVEL),
    COMMAND_ARGS_REGISTER_BUILTINS: booleanVar(true),
  })
  .transform((env) => ({
    logLevel: env.COMMAND_ARGS_LOG_LEVEL,
    registerBuiltins: env.COMMAND_ARGS_REGISTER_BUILTINS,
  }));

export type CommandArgsConfig = z.output<typeof configSchema>;

/**
 * Reads configuration from the environment.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: EnvSource = process.env): CommandArgsConfig {
  const result = configSchema.safeParse({ ...env });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid command-args configuration\n${details}`);
  }
  return result.data;
}
