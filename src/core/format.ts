/**
 * Cassette file format: Zod schemas and types for recorded cassettes.
 *
 * A cassette document captures one recording:
 * - The schema version it was written with
 * - When it was recorded
 * - Every (request, response) pair, in the order they were recorded
 */

import { z } from "zod";
import type { JsonValue } from "./normalize.js";

export const CASSETTE_VERSION = 2;

export const CASSETTE_EXTENSION = ".json";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const SerializedRequestSchema = z.object({
  method: z.string().min(1),
  args: z.record(JsonValueSchema),
});

export const SerializedResponseSchema = z.object({
  result: JsonValueSchema,
});

export const SerializedEntrySchema = z.tuple([
  SerializedRequestSchema,
  SerializedResponseSchema,
]);

export const CassetteHeaderSchema = z
  .object({
    version: z.unknown(),
  })
  .passthrough();

export const CassetteFileSchema = z.object({
  version: z.literal(CASSETTE_VERSION),
  recorded_at: z.string(),
  reqs: z.array(SerializedEntrySchema),
});

export type SerializedRequest = z.infer<typeof SerializedRequestSchema>;
export type SerializedResponse = z.infer<typeof SerializedResponseSchema>;
export type SerializedEntry = z.infer<typeof SerializedEntrySchema>;
export type CassetteFile = z.infer<typeof CassetteFileSchema>;

/**
 * Validate a parsed cassette document and return validation errors if invalid.
 */
export function validateCassetteFile(json: unknown): {
  success: boolean;
  data?: CassetteFile;
  errors?: z.ZodError;
} {
  const result = CassetteFileSchema.safeParse(json);
  if (result.success) {
    return { success: true, data: result.data };
  } else {
    return { success: false, errors: result.error };
  }
}

/**
 * Create a cassette document with the current version.
 */
export function createCassetteFile(
  reqs: SerializedEntry[] = [],
  recordedAt: Date = new Date()
): CassetteFile {
  return {
    version: CASSETTE_VERSION,
    recorded_at: recordedAt.toISOString(),
    reqs,
  };
}

/**
 * One-line summary of zod issues, for error messages.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}
