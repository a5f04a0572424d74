import fs from "node:fs";
import { logger } from "../config/logger.js";
import { nextCronOccurrence } from "../scheduling/scheduleCalculator.js";

export interface PluginMetadata {
  readonly title?: string;
  readonly version?: string;
  readonly author?: string;
  readonly description?: string;
  /** Cron expressions separated by `|`. */
  readonly schedule?: string;
  readonly runInShell?: boolean;
  readonly hidden?: boolean;
}

export interface ResolvedMetadata {
  readonly metadata: PluginMetadata;
  readonly nextAbsoluteFireTime?: Date;
}

export interface MetadataProvider {
  /**
   * `after` is the earliest instant the next cron occurrence may fall on;
   * it is the consumed fire time when re-deriving after an absolute fire.
   */
  resolve(sourcePath: string, after: Date): ResolvedMetadata;
}

const TAG_PREFIXES = ["cadence", "xbar"];
const TAG_PATTERN = new RegExp(
  String.raw`<(${TAG_PREFIXES.join("|")})\.([A-Za-z]+)>([\s\S]*?)</\1\.\2>`,
  "g",
);

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseMetadata(script: string): PluginMetadata {
  const tags = new Map<string, string>();

  for (const match of script.matchAll(TAG_PATTERN)) {
    const key = match[2];
    if (!tags.has(key)) {
      tags.set(key, match[3]);
    }
  }

  return {
    title: nonEmpty(tags.get("title")),
    version: nonEmpty(tags.get("version")),
    author: nonEmpty(tags.get("author")),
    description: nonEmpty(tags.get("desc")),
    schedule: nonEmpty(tags.get("schedule")),
    runInShell: parseBoolean(tags.get("runInShell") ?? tags.get("runInBash")),
    hidden: parseBoolean(tags.get("hidden")),
  };
}

export function resolveMetadata(metadata: PluginMetadata, after: Date): ResolvedMetadata {
  if (!metadata.schedule) {
    return { metadata };
  }
  return { metadata, nextAbsoluteFireTime: nextCronOccurrence(metadata.schedule, after) };
}

export const fileMetadataProvider: MetadataProvider = {
  resolve(sourcePath, after) {
    try {
      const script = fs.readFileSync(sourcePath, "utf-8");
      return resolveMetadata(parseMetadata(script), after);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ sourcePath, error: message }, "Failed to read plugin metadata");
      return { metadata: {} };
    }
  },
};
