import sqlite3 from "sqlite3";
import { open, Database } from "sqlite";
import { logger } from "../utils/logger";
import { BaseAppError, StoreErrors } from "../errors";
import { LOG_SOURCES, LOG_MESSAGES } from "../constants/log";
import { Dimension, isDimension } from "../constants/dimensions";
import { NewPreferenceSignal, PreferenceSignal, SignalPolarity } from "../types/preference.types";
import { parseSignalInput } from "../validators/signal.validator";

const DEFAULT_PAGE_SIZE = 200;

type SignalRow = {
  id: number;
  user_id: string;
  group_id: string;
  dimension: string;
  value: string;
  polarity: string;
  confidence: number;
  source_message_id: string;
  observed_at: number;
};

type Cursor = { observedAt: number; id: number };

const INSERT_COLUMNS =
  "user_id, group_id, dimension, value, polarity, confidence, source_message_id, observed_at";
const ROW_PLACEHOLDER = "(?, ?, ?, ?, ?, ?, ?, ?)";

export interface SignalStore {
  record(input: unknown): Promise<PreferenceSignal>;
  append(signal: NewPreferenceSignal): Promise<PreferenceSignal>;
  appendMany(signals: readonly NewPreferenceSignal[]): Promise<PreferenceSignal[]>;
  listFor(userId: string, groupId: string, dimension: Dimension): AsyncIterable<PreferenceSignal>;
  listForGroup(groupId: string): Promise<PreferenceSignal[]>;
}

/**
 * Append-only log of preference signals backed by SQLite.
 * There is no update or delete path: history is kept for audit and replay.
 */
export class SignalStoreService implements SignalStore {
  private db?: Database;

  constructor(private readonly pageSize: number = DEFAULT_PAGE_SIZE) {}

  private getDb(): Database {
    if (!this.db) {
      throw new StoreErrors.NotInitializedError();
    }
    return this.db;
  }

  async init(filename: string = "./signals.db"): Promise<void> {
    try {
      this.db = await open({
        filename: filename,
        driver: sqlite3.Database
      });

      await this.db.exec(`
        CREATE TABLE IF NOT EXISTS preference_signals (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          user_id TEXT NOT NULL,
          group_id TEXT NOT NULL,
          dimension TEXT NOT NULL,
          value TEXT NOT NULL,
          polarity TEXT NOT NULL,
          confidence REAL NOT NULL,
          source_message_id TEXT NOT NULL,
          observed_at INTEGER NOT NULL,
          recorded_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
        );
      `);

      await this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_signals_group ON preference_signals(group_id, observed_at, id);
      `);

      await this.db.exec(`
        CREATE INDEX IF NOT EXISTS idx_signals_key ON preference_signals(group_id, user_id, dimension, observed_at, id);
      `);

      logger.system(LOG_MESSAGES.STORE_INITIALIZED, { db: filename });
    } catch (error) {
      if (error instanceof Error) {
        throw new StoreErrors.InitFailedError({ reason: error.message });
      }
      throw new StoreErrors.InitFailedError();
    }
  }

  /**
   * Validates and appends one signal. Invalid signals are rejected before
   * anything is written.
   */
  async record(input: unknown): Promise<PreferenceSignal> {
    return this.append(parseSignalInput(input));
  }

  /** Appends a signal that already passed validation. */
  async append(signal: NewPreferenceSignal): Promise<PreferenceSignal> {
    const db = this.getDb();

    try {
      const result = await db.run(
        `INSERT INTO preference_signals (${INSERT_COLUMNS}) VALUES ${ROW_PLACEHOLDER}`,
        toParams(signal)
      );

      if (result.lastID === undefined) {
        throw new StoreErrors.WriteFailedError({ reason: "No row id returned", groupId: signal.groupId });
      }

      return this.recorded({ id: result.lastID, ...signal });
    } catch (error) {
      throw this.toWriteError(error, { groupId: signal.groupId });
    }
  }

  /**
   * Appends validated signals in one INSERT statement, so readers see all of
   * them or none. Ids follow the order of `signals`.
   */
  async appendMany(signals: readonly NewPreferenceSignal[]): Promise<PreferenceSignal[]> {
    if (signals.length === 0) {
      return [];
    }

    const db = this.getDb();
    const groupId = signals[0].groupId;

    try {
      const rows = await db.all<{ id: number }[]>(
        `INSERT INTO preference_signals (${INSERT_COLUMNS})
         VALUES ${signals.map(() => ROW_PLACEHOLDER).join(", ")}
         RETURNING id`,
        signals.flatMap(toParams)
      );

      if (rows.length !== signals.length) {
        throw new StoreErrors.WriteFailedError({ reason: "Row ids missing from insert", groupId });
      }

      // AUTOINCREMENT assigns ascending ids in VALUES order
      const ids = rows.map(row => row.id).sort((a, b) => a - b);
      return signals.map((signal, index) => this.recorded({ id: ids[index], ...signal }));
    } catch (error) {
      throw this.toWriteError(error, { groupId });
    }
  }

  /**
   * Lazy sequence of one user's signals for a dimension, oldest first.
   * Each iteration starts over and reads the table page by page.
   */
  listFor(userId: string, groupId: string, dimension: Dimension): AsyncIterable<PreferenceSignal> {
    return {
      [Symbol.asyncIterator]: () => this.iteratePages(userId, groupId, dimension)
    };
  }

  async listForGroup(groupId: string): Promise<PreferenceSignal[]> {
    const db = this.getDb();

    try {
      const rows = await db.all<SignalRow[]>(
        `SELECT * FROM preference_signals
         WHERE group_id = ?
         ORDER BY observed_at ASC, id ASC`,
        [groupId]
      );
      return rows.map(row => this.toSignal(row));
    } catch (error) {
      throw this.toReadError(error, { groupId });
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      try {
        await this.db.close();
        this.db = undefined;
        logger.system(LOG_MESSAGES.STORE_CLOSED);
      } catch (error) {
        if (error instanceof Error) {
          throw new StoreErrors.CloseFailedError({ reason: error.message });
        }
        throw new StoreErrors.CloseFailedError();
      }
    }
  }

  private async *iteratePages(
    userId: string,
    groupId: string,
    dimension: Dimension
  ): AsyncGenerator<PreferenceSignal, void, undefined> {
    let cursor: Cursor | null = null;

    while (true) {
      const page = await this.readPage(userId, groupId, dimension, cursor);

      for (const row of page) {
        yield this.toSignal(row);
      }

      if (page.length < this.pageSize) {
        return;
      }

      const last = page[page.length - 1];
      cursor = { observedAt: last.observed_at, id: last.id };
    }
  }

  private async readPage(
    userId: string,
    groupId: string,
    dimension: Dimension,
    cursor: Cursor | null
  ): Promise<SignalRow[]> {
    const db = this.getDb();

    try {
      if (!cursor) {
        return await db.all<SignalRow[]>(
          `SELECT * FROM preference_signals
           WHERE group_id = ? AND user_id = ? AND dimension = ?
           ORDER BY observed_at ASC, id ASC
           LIMIT ?`,
          [groupId, userId, dimension, this.pageSize]
        );
      }

      return await db.all<SignalRow[]>(
        `SELECT * FROM preference_signals
         WHERE group_id = ? AND user_id = ? AND dimension = ?
           AND (observed_at > ? OR (observed_at = ? AND id > ?))
         ORDER BY observed_at ASC, id ASC
         LIMIT ?`,
        [groupId, userId, dimension, cursor.observedAt, cursor.observedAt, cursor.id, this.pageSize]
      );
    } catch (error) {
      throw this.toReadError(error, { groupId, userId, dimension });
    }
  }

  private toSignal(row: SignalRow): PreferenceSignal {
    let value: unknown;
    try {
      value = JSON.parse(row.value);
    } catch (parseError) {
      throw new StoreErrors.ReadFailedError({ reason: "Corrupted signal value", id: row.id });
    }

    if (
      !isDimension(row.dimension) ||
      !isPolarity(row.polarity) ||
      (typeof value !== "string" && typeof value !== "number")
    ) {
      throw new StoreErrors.ReadFailedError({ reason: "Corrupted signal row", id: row.id });
    }

    return Object.freeze({
      id: row.id,
      userId: row.user_id,
      groupId: row.group_id,
      dimension: row.dimension,
      value,
      polarity: row.polarity,
      confidence: row.confidence,
      sourceMessageId: row.source_message_id,
      observedAt: row.observed_at
    });
  }

  private recorded(signal: PreferenceSignal): PreferenceSignal {
    logger.debug(LOG_SOURCES.STORE, LOG_MESSAGES.SIGNAL_RECORDED, {
      id: signal.id,
      groupId: signal.groupId,
      userId: signal.userId,
      dimension: signal.dimension
    });
    return Object.freeze(signal);
  }

  private toWriteError(error: unknown, meta: Record<string, unknown>): BaseAppError {
    if (error instanceof BaseAppError) {
      return error;
    }
    if (error instanceof Error) {
      return new StoreErrors.WriteFailedError({ ...meta, reason: error.message });
    }
    return new StoreErrors.WriteFailedError(meta);
  }

  private toReadError(error: unknown, meta: Record<string, unknown>): BaseAppError {
    if (error instanceof BaseAppError) {
      return error;
    }
    if (error instanceof Error) {
      return new StoreErrors.ReadFailedError({ ...meta, reason: error.message });
    }
    return new StoreErrors.ReadFailedError(meta);
  }
}

function toParams(signal: NewPreferenceSignal): Array<string | number> {
  return [
    signal.userId,
    signal.groupId,
    signal.dimension,
    JSON.stringify(signal.value),
    signal.polarity,
    signal.confidence,
    signal.sourceMessageId,
    signal.observedAt
  ];
}

function isPolarity(value: string): value is SignalPolarity {
  return value === "positive" || value === "negative";
}

export const signalStore = new SignalStoreService();
