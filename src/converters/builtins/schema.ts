import type { ZodType, ZodTypeDef } from "zod";
import { Optional } from "../optional";

/**
 * Runs a token through a schema; a rejected token is none, not an error.
 */
export function convertWith<T>(schema: ZodType<T, ZodTypeDef, string>, token: string): Optional<T> {
  const result = schema.safeParse(token);
  return result.success ? Optional.of(result.data) : Optional.none();
}
