import * as v from "valibot";
import { DEFAULT_TIME_SLICE_MS, type Logger } from "./documents";

/**
 * Configuration section the server reads from the client.
 */
export const SETTINGS_SECTION = "cql";

const CompletionSettingsSchema = v.object({
  includeDeprecated: v.optional(v.boolean(), true),
  snippets: v.optional(v.boolean(), true),
});

const ParserSettingsSchema = v.object({
  verifyIncremental: v.optional(v.boolean(), false),
  timeSliceMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), DEFAULT_TIME_SLICE_MS),
});

const SettingsSchema = v.object({
  completion: v.optional(CompletionSettingsSchema, {}),
  parser: v.optional(ParserSettingsSchema, {}),
});

export type ServerSettings = v.InferOutput<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: ServerSettings = v.parse(SettingsSchema, {});

/**
 * Validate the `cql` settings object sent by the client. Missing keys take
 * their defaults; an invalid object is logged and replaced by the defaults.
 */
export function parseSettings(raw: unknown, logger?: Pick<Logger, "warn">): ServerSettings {
  if (raw === undefined || raw === null) {
    return DEFAULT_SETTINGS;
  }
  const result = v.safeParse(SettingsSchema, raw);
  if (!result.success) {
    const details = result.issues
      .map((issue) => {
        const path = v.getDotPath(issue);
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join("; ");
    logger?.warn(`Invalid ${SETTINGS_SECTION} settings, using defaults: ${details}`);
    return DEFAULT_SETTINGS;
  }
  return result.output;
}

/**
 * Pick `section` out of a `workspace/didChangeConfiguration` payload.
 */
export function readSection(settings: unknown, section: string = SETTINGS_SECTION): unknown {
  if (typeof settings !== "object" || settings === null) {
    return undefined;
  }
  return Object.entries(settings).find(([key]) => key === section)?.[1];
}
