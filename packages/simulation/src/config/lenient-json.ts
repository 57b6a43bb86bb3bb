import { readFileSync } from "node:fs";
import stripJsonComments from "strip-json-comments";
import type { z } from "zod";
import { ConfigurationError } from "../errors.js";

/** Parses JSON that may carry `//` and `/* *\/` comments and trailing commas. */
export function parseLenientJson(text: string, file: string): unknown {
  try {
    return JSON.parse(stripJsonComments(text, { trailingCommas: true }));
  } catch (err) {
    throw new ConfigurationError(`invalid JSON: ${err instanceof Error ? err.message : String(err)}`, { file });
  }
}

export function readLenientJson(path: string, file: string = path): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`cannot read configuration: ${err instanceof Error ? err.message : String(err)}`, {
      file,
    });
  }
  return parseLenientJson(text, file);
}

/** Validates `raw` against `schema`, reporting the first issue with its key path. */
export function parseConfig<T extends z.ZodTypeAny>(schema: T, raw: unknown, file: string): z.output<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(issue.message, { file, key: issue.path.join(".") || "<root>" });
  }
  return result.data;
}
