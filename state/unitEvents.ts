import type BetterSqlite3 from "better-sqlite3";
import type { DebugEvent, DebugEventKind, UnitEventSink } from "../plugins/debugLog.js";

export interface UnitEventRow {
  readonly id: number;
  readonly unit_id: string;
  readonly kind: DebugEventKind;
  readonly value: string;
  readonly created_at: string;
}

export function insertUnitEvent(
  db: BetterSqlite3.Database,
  unitId: string,
  event: DebugEvent,
): number {
  const result = db
    .prepare("INSERT INTO unit_events (unit_id, kind, value, created_at) VALUES (?, ?, ?, ?)")
    .run(unitId, event.kind, event.value, event.timestamp.toISOString());

  return Number(result.lastInsertRowid);
}

export function getUnitEvents(
  db: BetterSqlite3.Database,
  unitId: string,
  limit: number = 100,
): readonly UnitEventRow[] {
  return db
    .prepare(
      `SELECT id, unit_id, kind, value, created_at
       FROM unit_events
       WHERE unit_id = ?
       ORDER BY id DESC
       LIMIT ?`,
    )
    .all(unitId, limit) as UnitEventRow[];
}

/** Deletes all but the newest `keep` events of a unit. */
export function pruneUnitEvents(db: BetterSqlite3.Database, unitId: string, keep: number): number {
  const result = db
    .prepare(
      `DELETE FROM unit_events
       WHERE unit_id = ?
         AND id NOT IN (
           SELECT id FROM unit_events WHERE unit_id = ? ORDER BY id DESC LIMIT ?
         )`,
    )
    .run(unitId, unitId, keep);

  return result.changes;
}

export function deleteUnitEvents(db: BetterSqlite3.Database, unitId: string): number {
  return db.prepare("DELETE FROM unit_events WHERE unit_id = ?").run(unitId).changes;
}

export class SqliteUnitEventSink implements UnitEventSink {
  constructor(
    private readonly db: BetterSqlite3.Database,
    private readonly keepPerUnit: number,
  ) {}

  record(unitId: string, event: DebugEvent): void {
    insertUnitEvent(this.db, unitId, event);
    pruneUnitEvents(this.db, unitId, this.keepPerUnit);
  }

  recent(unitId: string, limit: number): readonly DebugEvent[] {
    return getUnitEvents(this.db, unitId, limit)
      .map((row) => ({ timestamp: new Date(row.created_at), kind: row.kind, value: row.value }))
      .reverse();
  }

  forget(unitId: string): void {
    deleteUnitEvents(this.db, unitId);
  }
}
