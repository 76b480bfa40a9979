/**
 * Postgres Tick Repository
 */

import { eq, sql } from "drizzle-orm";
import type { PgQueryResultHKT } from "drizzle-orm/pg-core";
import { ResultAsync } from "neverthrow";
import { priceTicks } from "@updown-recorder/db";
import type { SchemaDatabase } from "@updown-recorder/db";
import type { Tick } from "@updown-recorder/core";

import type { TickRepository } from "../interfaces/tick-repository";
import { toDbError, type RepositoryError } from "../types";

export function createPostgresTickRepository<TQueryResult extends PgQueryResultHKT>(
  db: SchemaDatabase<TQueryResult>,
): TickRepository {
  return {
    insertTick(tick: Tick): ResultAsync<void, RepositoryError> {
      return ResultAsync.fromPromise(
        db.insert(priceTicks).values({
          instrumentId: tick.instrumentId,
          ts: tick.ts,
          epochMs: tick.epochMs,
          secondsElapsed: tick.secondsElapsed,
          yesBestBid: tick.yesBestBid,
          yesBestAsk: tick.yesBestAsk,
          noBestBid: tick.noBestBid,
          noBestAsk: tick.noBestAsk,
          yesMid: tick.yesMid,
          noMid: tick.noMid,
          source: tick.source,
        }),
        toDbError,
      ).map(() => undefined);
    },

    countTicks(instrumentId: string): ResultAsync<number, RepositoryError> {
      return ResultAsync.fromPromise(
        db
          .select({ count: sql<number>`count(*)`.mapWith(Number) })
          .from(priceTicks)
          .where(eq(priceTicks.instrumentId, instrumentId)),
        toDbError,
      ).map(rows => rows[0]?.count ?? 0);
    },
  };
}
