import type { z } from "zod";
import { fromZodError } from "./errors";

/**
 * Parses `input` with `schema`, throwing a ValidationError that names the
 * failing fields instead of returning zod's raw error.
 */
export function parseOrThrow<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  context: string
): z.output<TSchema> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw fromZodError(context, parsed.error);
  return parsed.data;
}
