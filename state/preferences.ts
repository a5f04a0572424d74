import type BetterSqlite3 from "better-sqlite3";

/** Records which units the user has disabled. */
export interface PreferencesStore {
  isDisabled(unitId: string): boolean;
  addDisabled(unitId: string): void;
  removeDisabled(unitId: string): void;
  disabledIds(): readonly string[];
}

export class SqlitePreferencesStore implements PreferencesStore {
  constructor(private readonly db: BetterSqlite3.Database) {}

  isDisabled(unitId: string): boolean {
    const row = this.db
      .prepare("SELECT 1 AS found FROM disabled_units WHERE unit_id = ?")
      .get(unitId) as { found: number } | undefined;
    return row !== undefined;
  }

  addDisabled(unitId: string): void {
    this.db.prepare("INSERT OR IGNORE INTO disabled_units (unit_id) VALUES (?)").run(unitId);
  }

  removeDisabled(unitId: string): void {
    this.db.prepare("DELETE FROM disabled_units WHERE unit_id = ?").run(unitId);
  }

  disabledIds(): readonly string[] {
    const rows = this.db
      .prepare("SELECT unit_id FROM disabled_units ORDER BY unit_id ASC")
      .all() as ReadonlyArray<{ unit_id: string }>;
    return rows.map((row) => row.unit_id);
  }
}

export class MemoryPreferencesStore implements PreferencesStore {
  private readonly disabled: Set<string>;

  constructor(initiallyDisabled: Iterable<string> = []) {
    this.disabled = new Set(initiallyDisabled);
  }

  isDisabled(unitId: string): boolean {
    return this.disabled.has(unitId);
  }

  addDisabled(unitId: string): void {
    this.disabled.add(unitId);
  }

  removeDisabled(unitId: string): void {
    this.disabled.delete(unitId);
  }

  disabledIds(): readonly string[] {
    return [...this.disabled].sort();
  }
}
