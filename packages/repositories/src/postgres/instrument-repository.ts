/**
 * Postgres Instrument Repository
 *
 * - Insert-or-ignore keyed by instrument id
 * - resolved is the only column ever updated
 */

import { eq, sql } from "drizzle-orm";
import type { PgQueryResultHKT } from "drizzle-orm/pg-core";
import { errAsync, okAsync, ResultAsync } from "neverthrow";
import { instruments, priceTicks } from "@updown-recorder/db";
import type { InstrumentRow, SchemaDatabase } from "@updown-recorder/db";
import { isWindowClass } from "@updown-recorder/core";
import type { Instrument, WindowClass } from "@updown-recorder/core";

import type { InstrumentRepository, InstrumentStats } from "../interfaces/instrument-repository";
import { notFound, toDbError, type RepositoryError } from "../types";

function toInstrument(row: InstrumentRow): ResultAsync<Instrument, RepositoryError> {
  const windowClass = row.windowClass;
  if (!isWindowClass(windowClass)) {
    const error: RepositoryError = { type: "DB_ERROR", message: `Unknown window class "${windowClass}" for ${row.id}` };
    return errAsync(error);
  }
  return okAsync({
    id: row.id,
    handles: { yes: row.yesTokenId, no: row.noTokenId },
    openTs: row.openTimestamp,
    closeTs: row.closeTimestamp,
    windowClass,
    resolved: row.resolved,
  });
}

/**
 * Create a Postgres instrument repository
 */
export function createPostgresInstrumentRepository<TQueryResult extends PgQueryResultHKT>(
  db: SchemaDatabase<TQueryResult>,
): InstrumentRepository {
  return {
    // ─────────────────────────────────────────────────────────────────────────────
    // Writes
    // ─────────────────────────────────────────────────────────────────────────────

    insertInstrument(instrument: Instrument): ResultAsync<boolean, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .insert(instruments)
          .values({
            id: instrument.id,
            yesTokenId: instrument.handles.yes,
            noTokenId: instrument.handles.no,
            openTimestamp: instrument.openTs,
            closeTimestamp: instrument.closeTs,
            resolved: instrument.resolved,
            windowClass: instrument.windowClass,
          })
          .onConflictDoNothing({ target: instruments.id })
          .returning({ id: instruments.id }),
        toDbError,
      ).map(rows => rows.length > 0);
    },

    markResolved(instrumentId: string): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .update(instruments)
          .set({ resolved: true })
          .where(eq(instruments.id, instrumentId))
          .returning({ id: instruments.id }),
        toDbError,
      ).andThen(rows =>
        rows.length > 0 ? okAsync(undefined) : errAsync(notFound(`Instrument ${instrumentId} not found`)),
      );
    },

    deleteInstrument(instrumentId: string): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db.delete(instruments).where(eq(instruments.id, instrumentId)).returning({ id: instruments.id }),
        toDbError,
      ).andThen(rows =>
        rows.length > 0 ? okAsync(undefined) : errAsync(notFound(`Instrument ${instrumentId} not found`)),
      );
    },

    // ─────────────────────────────────────────────────────────────────────────────
    // Reads
    // ─────────────────────────────────────────────────────────────────────────────

    findById(instrumentId: string): ResultAsync<Instrument | null, RepositoryError> {
      return ResultAsync.fromPromise(
        db.select().from(instruments).where(eq(instruments.id, instrumentId)).limit(1),
        toDbError,
      ).andThen(rows => {
        const row = rows[0];
        return row === undefined ? okAsync(null) : toInstrument(row);
      });
    },

    getStats(windowClass: WindowClass): ResultAsync<InstrumentStats, RepositoryError> {
      const counts = ResultAsync.fromPromise(
        db
          .select({
            total: sql<number>`count(*)`.mapWith(Number),
            resolved: sql<number>`count(*) filter (where ${instruments.resolved})`.mapWith(Number),
          })
          .from(instruments)
          .where(eq(instruments.windowClass, windowClass)),
        toDbError,
      );

      const ticks = ResultAsync.fromPromise(
        db
          .select({ count: sql<number>`count(*)`.mapWith(Number) })
          .from(priceTicks)
          .innerJoin(instruments, eq(instruments.id, priceTicks.instrumentId))
          .where(eq(instruments.windowClass, windowClass)),
        toDbError,
      );

      return ResultAsync.combine([counts, ticks]).map(([countRows, tickRows]) => {
        const total = countRows[0]?.total ?? 0;
        const resolved = countRows[0]?.resolved ?? 0;
        return {
          total,
          resolved,
          active: total - resolved,
          totalTicks: tickRows[0]?.count ?? 0,
        };
      });
    },
  };
}
