/**
 * Gamma Lookup Client
 *
 * Resolves an instrument id (Gamma market slug) to the CLOB token ids of its
 * Up/Yes and Down/No outcomes.
 */

import axios, { type AxiosInstance } from "axios";
import { ok, type ResultAsync } from "neverthrow";
import { z } from "zod";
import type { SideHandles } from "@updown-recorder/core";
import { logger } from "@updown-recorder/utils";

import type { AdapterError } from "../ports/adapter-error";
import type { LookupPort } from "../ports/lookup-port";
import { getJson, trimBaseUrl, type RestClientOptions } from "./http";
import { GammaMarketsResponseSchema, type GammaMarket } from "./types";

const log = logger.child("gamma");

const YES_OUTCOMES: ReadonlySet<string> = new Set(["Yes", "Up"]);
const NO_OUTCOMES: ReadonlySet<string> = new Set(["No", "Down"]);

type Outcome = "yes" | "no";

function classifyOutcome(outcome: string): Outcome | null {
  if (YES_OUTCOMES.has(outcome)) return "yes";
  if (NO_OUTCOMES.has(outcome)) return "no";
  return null;
}

function parseStringList(value: string | string[] | null | undefined): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value;

  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch {
    return [];
  }
  const parsed = z.array(z.string()).safeParse(decoded);
  return parsed.success ? parsed.data : [];
}

/**
 * Pull both side handles out of one Gamma market record.
 *
 * `tokens[]` is preferred; the parallel `clobTokenIds` / `outcomes` lists fill
 * whatever it leaves missing.
 */
export function extractSideHandles(market: GammaMarket): SideHandles | null {
  let yes: string | undefined;
  let no: string | undefined;

  for (const token of market.tokens ?? []) {
    const side = classifyOutcome(token.outcome);
    if (side === "yes") yes = token.token_id;
    else if (side === "no") no = token.token_id;
  }

  if (!yes || !no) {
    const ids = parseStringList(market.clobTokenIds);
    const outcomes = parseStringList(market.outcomes);
    if (ids.length >= 2 && outcomes.length >= 2) {
      outcomes.forEach((outcome, i) => {
        const side = classifyOutcome(outcome);
        const id = ids[i];
        if (id === undefined) return;
        if (side === "yes") yes = id;
        else if (side === "no") no = id;
      });
    }
  }

  if (!yes || !no) return null;
  return { yes, no };
}

export class GammaLookupClient implements LookupPort {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(options: RestClientOptions) {
    this.http = options.http ?? axios.create();
    this.baseUrl = trimBaseUrl(options.baseUrl);
    this.timeoutMs = options.timeoutMs;
  }

  resolve(instrumentId: string): ResultAsync<SideHandles | null, AdapterError> {
    return getJson(this.http, `${this.baseUrl}/markets`, { slug: instrumentId }, this.timeoutMs).andThen(response => {
      if (response.status !== 200) {
        log.debug("lookup returned non-200", { instrumentId, status: response.status });
        return ok(null);
      }

      const parsed = GammaMarketsResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        log.debug("lookup response not understood", { instrumentId, error: parsed.error.message });
        return ok(null);
      }

      const market = parsed.data[0];
      return ok(market === undefined ? null : extractSideHandles(market));
    });
  }
}
