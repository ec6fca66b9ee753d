import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import type { DenyReason } from "../../protocol/enums/DenyReason";
import type { ServerClock } from "../../world/ServerClock";
import type { EventBus } from "../events/EventBus";
import type { IntentKind, TargetIntentDeniedEvent } from "../events/GameEvents";

export type IntentAuditConfig = {
  enabled: boolean;
  /** SQLite file path, or ":memory:". */
  dbPath: string;
  batchSize: number;
  flushMs: number;
  dedupWindowMs: number;
};

type DeniedIntentInput = {
  actorId: number;
  targetId: number;
  intent: IntentKind;
  reason: DenyReason;
};

type DeniedIntentBucket = DeniedIntentInput & {
  firstSeenAt: number;
  lastSeenAt: number;
  count: number;
};

export type DeniedIntentRow = {
  actor_id: number;
  target_id: number;
  intent: string;
  reason: string;
  first_seen_at: number;
  last_seen_at: number;
  count: number;
};

/**
 * Audit trail of refused targeting and attack intents.
 *
 * Repeated denials of the same (actor, target, intent, reason) inside the
 * dedup window collapse into one row with a count, so a client spamming
 * an illegal attack produces one row, not hundreds. Rows are written in
 * batches inside a single transaction.
 */
export class IntentAuditService {
  private readonly buckets = new Map<string, DeniedIntentBucket>();
  private readonly ready: DeniedIntentBucket[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private readonly db: Database.Database | null = null;
  private readonly insertStmt: Database.Statement<
    [number, number, string, string, number, number, number]
  > | null = null;

  constructor(
    private readonly config: IntentAuditConfig,
    private readonly clock: ServerClock
  ) {
    if (!config.enabled) return;

    if (config.dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
    }
    this.db = new Database(config.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS denied_intents (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        actor_id INTEGER NOT NULL,
        target_id INTEGER NOT NULL,
        intent TEXT NOT NULL,
        reason TEXT NOT NULL,
        first_seen_at INTEGER NOT NULL,
        last_seen_at INTEGER NOT NULL,
        count INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_denied_intents_actor ON denied_intents(actor_id, last_seen_at);
    `);
    this.insertStmt = this.db.prepare<[number, number, string, string, number, number, number]>(
      `INSERT INTO denied_intents (actor_id, target_id, intent, reason, first_seen_at, last_seen_at, count)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    );
  }

  /**
   * Subscribes to TargetIntentDenied events.
   * @returns unsubscribe function
   */
  attach(eventBus: EventBus): () => void {
    return eventBus.on("TargetIntentDenied", (event: TargetIntentDeniedEvent) => {
      this.record({
        actorId: event.actorId,
        targetId: event.targetId,
        intent: event.intent,
        reason: event.reason
      });
    });
  }

  start(): void {
    if (!this.db || this.flushTimer) return;
    this.flushTimer = setInterval(() => this.flush(), this.config.flushMs);
  }

  record(input: DeniedIntentInput): void {
    if (!this.db) return;

    const now = this.clock.now();
    const key = [input.actorId, input.targetId, input.intent, input.reason].join("|");
    const existing = this.buckets.get(key);
    if (existing && now - existing.firstSeenAt <= this.config.dedupWindowMs) {
      existing.count += 1;
      existing.lastSeenAt = now;
      return;
    }

    if (existing) {
      this.ready.push(existing);
    }
    this.buckets.set(key, { ...input, firstSeenAt: now, lastSeenAt: now, count: 1 });

    if (this.ready.length + this.buckets.size >= this.config.batchSize) {
      this.flush();
    }
  }

  /**
   * Writes every pending bucket.
   * @returns number of rows written
   */
  flush(): number {
    if (!this.db || !this.insertStmt) return 0;
    const rows = [...this.ready, ...this.buckets.values()];
    if (rows.length === 0) return 0;

    const insert = this.insertStmt;
    const writeAll = this.db.transaction((batch: DeniedIntentBucket[]) => {
      for (const row of batch) {
        insert.run(row.actorId, row.targetId, row.intent, row.reason, row.firstSeenAt, row.lastSeenAt, row.count);
      }
    });

    try {
      writeAll(rows);
    } catch (err) {
      console.error("[IntentAuditService] Failed to write denied intents:", err);
      return 0;
    }

    this.ready.length = 0;
    this.buckets.clear();
    return rows.length;
  }

  getRecentDenials(limit = 50): DeniedIntentRow[] {
    if (!this.db) return [];
    return this.db
      .prepare<[number], DeniedIntentRow>(
        `SELECT actor_id, target_id, intent, reason, first_seen_at, last_seen_at, count
         FROM denied_intents ORDER BY id DESC LIMIT ?`
      )
      .all(limit);
  }

  shutdown(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    this.flush();
    this.db?.close();
  }
}
