/**
 * ClobBookClient Unit Tests
 */

import { describe, expect, test } from "vitest";

import { ClobBookClient } from "../src/polymarket/clob-book-client";
import { createAxiosStub } from "./helpers/axios-stub";

describe("ClobBookClient.fetchBook", () => {
  test("should parse decimal strings and drop empty levels", async () => {
    const { http, requests } = createAxiosStub(() => ({
      status: 200,
      data: {
        asset_id: "tok-up",
        bids: [
          { price: "0.50", size: "100" },
          { price: "0.49", size: "0" },
        ],
        asks: [{ price: "0.52", size: "25.5" }],
      },
    }));
    const client = new ClobBookClient({ baseUrl: "https://clob.test/", timeoutMs: 500, http });

    const result = await client.fetchBook("tok-up");

    expect(result._unsafeUnwrap()).toEqual({
      bids: [{ price: 0.5, size: 100 }],
      asks: [{ price: 0.52, size: 25.5 }],
    });
    expect(requests[0]?.url).toBe("https://clob.test/book");
    expect(requests[0]?.params).toEqual({ token_id: "tok-up" });
  });

  test("should treat missing sides as empty", async () => {
    const { http } = createAxiosStub(() => ({ status: 200, data: { asset_id: "tok-up" } }));
    const client = new ClobBookClient({ baseUrl: "https://clob.test", timeoutMs: 500, http });

    const result = await client.fetchBook("tok-up");

    expect(result._unsafeUnwrap()).toEqual({ bids: [], asks: [] });
  });

  test("should return http_error for a non-200 status", async () => {
    const { http } = createAxiosStub(() => ({ status: 500, data: "upstream error" }));
    const client = new ClobBookClient({ baseUrl: "https://clob.test", timeoutMs: 500, http });

    const result = await client.fetchBook("tok-up");

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "http_error",
      message: "GET /book returned 500",
      status: 500,
    });
  });

  test("should return invalid_response for unparseable levels", async () => {
    const { http } = createAxiosStub(() => ({
      status: 200,
      data: { bids: [{ price: "abc", size: "1" }], asks: [] },
    }));
    const client = new ClobBookClient({ baseUrl: "https://clob.test", timeoutMs: 500, http });

    const result = await client.fetchBook("tok-up");

    expect(result._unsafeUnwrapErr().type).toBe("invalid_response");
  });
});
