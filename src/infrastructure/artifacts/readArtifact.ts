import fs from "fs/promises";

import type { z } from "zod";

import { ArtifactError } from "./ArtifactError";

/**
 * Parses an artifact document against its schema. Issues are flattened into
 * the error metadata so the startup log names the offending field.
 */
export function parseArtifact<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  source: string
): z.output<T> {
  const result = schema.safeParse(raw);

  if (!result.success) {
    throw new ArtifactError(`Malformed artifact: ${source}`, {
      source,
      issues: result.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
      ),
    });
  }

  return result.data;
}

export async function readJsonArtifact<T extends z.ZodTypeAny>(
  schema: T,
  filePath: string
): Promise<z.output<T>> {
  let text: string;

  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new ArtifactError(`Artifact not readable: ${filePath}`, {
      source: filePath,
      cause: String(err),
    });
  }

  let raw: unknown;

  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ArtifactError(`Artifact is not valid JSON: ${filePath}`, {
      source: filePath,
      cause: String(err),
    });
  }

  return parseArtifact(schema, raw, filePath);
}
