import fs from "node:fs";
import path from "node:path";
import { logger } from "../config/logger.js";
import { intervalTokenFromFileName } from "../scheduling/scheduleCalculator.js";
import type { SourceChange, UnitDescriptor, UnitSource } from "./types.js";

const DEFAULT_DEBOUNCE_MS = 250;

export function descriptorFor(dir: string, fileName: string): UnitDescriptor {
  return {
    id: fileName,
    sourcePath: path.join(dir, fileName),
    intervalToken: intervalTokenFromFileName(fileName),
  };
}

export function diffDescriptors(
  previous: readonly UnitDescriptor[],
  next: readonly UnitDescriptor[],
): readonly SourceChange[] {
  const previousIds = new Set(previous.map((d) => d.id));
  const nextIds = new Set(next.map((d) => d.id));
  const changes: SourceChange[] = [];

  for (const descriptor of previous) {
    if (!nextIds.has(descriptor.id)) {
      changes.push({ type: "removed", id: descriptor.id });
    }
  }
  for (const descriptor of next) {
    if (!previousIds.has(descriptor.id)) {
      changes.push({ type: "added", descriptor });
    }
  }

  return changes;
}

function isPluginFile(dir: string, entry: fs.Dirent): boolean {
  if (entry.name.startsWith(".")) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;

  try {
    return fs.statSync(path.join(dir, entry.name)).isFile();
  } catch {
    return false; // dangling symlink
  }
}

/** Treats every regular file in a directory as a plugin. */
export class DirectorySource implements UnitSource {
  constructor(
    private readonly dir: string,
    private readonly debounceMs: number = DEFAULT_DEBOUNCE_MS,
  ) {}

  scan(): readonly UnitDescriptor[] {
    if (!fs.existsSync(this.dir)) {
      logger.warn({ dir: this.dir }, "Plugin directory does not exist");
      return [];
    }

    return fs
      .readdirSync(this.dir, { withFileTypes: true })
      .filter((entry) => isPluginFile(this.dir, entry))
      .map((entry) => entry.name)
      .sort()
      .map((name) => descriptorFor(this.dir, name));
  }

  watch(listener: (change: SourceChange) => void): () => void {
    let known = this.scan();
    let debounceTimer: NodeJS.Timeout | null = null;

    const rescan = () => {
      debounceTimer = null;
      const current = this.scan();
      const changes = diffDescriptors(known, current);
      known = current;

      for (const change of changes) {
        const unitId = change.type === "added" ? change.descriptor.id : change.id;
        logger.info({ change: change.type, unitId }, "Plugin directory changed");
        listener(change);
      }
    };

    const watcher = fs.watch(this.dir, () => {
      if (debounceTimer) clearTimeout(debounceTimer);
      debounceTimer = setTimeout(rescan, this.debounceMs);
    });

    watcher.on("error", (error) => {
      logger.error({ dir: this.dir, error: error.message }, "Plugin directory watcher failed");
    });

    return () => {
      if (debounceTimer) clearTimeout(debounceTimer);
      watcher.close();
    };
  }
}
