/**
 * CLOB Book Client - full order-book snapshot per token over REST
 */

import axios, { type AxiosInstance } from "axios";
import { err, ok, type ResultAsync } from "neverthrow";
import type { BookLevels, PriceLevel, SideHandle } from "@updown-recorder/core";

import { httpError, invalidResponse, type AdapterError } from "../ports/adapter-error";
import type { BookSnapshotPort } from "../ports/book-snapshot-port";
import { getJson, trimBaseUrl, type RestClientOptions } from "./http";
import { ClobBookSchema, type ClobLevel } from "./types";

function positiveLevels(levels: ClobLevel[]): PriceLevel[] {
  return levels.filter(level => level.size > 0).map(level => ({ price: level.price, size: level.size }));
}

export class ClobBookClient implements BookSnapshotPort {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: RestClientOptions) {
    this.http = options.http ?? axios.create();
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs;
  }

  fetchBook(handle: SideHandle): ResultAsync<BookLevels, AdapterError> {
    return getJson(this.http, `${this.baseUrl}/book`, { token_id: handle }, this.timeoutMs).andThen(response => {
      if (response.status !== 200) {
        return err(httpError(`GET /book returned ${response.status}`, response.status));
      }

      const parsed = ClobBookSchema.safeParse(response.data);
      if (!parsed.success) {
        return err(invalidResponse(`Malformed book for ${handle}: ${parsed.error.message}`));
      }

      return ok({
        bids: positiveLevels(parsed.data.bids),
        asks: positiveLevels(parsed.data.asks),
      });
    });
  }
}
