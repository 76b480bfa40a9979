/**
 * Shared axios plumbing for the Polymarket REST clients
 */

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { ResultAsync } from "neverthrow";

import { httpError, type AdapterError } from "../ports/adapter-error";

export interface RestClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /**
   * Injected axios instance (tests pass one with an in-process adapter)
   */
  http?: AxiosInstance;
}

export function toHttpError(e: unknown): AdapterError {
  if (axios.isAxiosError(e)) {
    return httpError(e.message, e.response?.status);
  }
  return httpError(e instanceof Error ? e.message : String(e));
}

/**
 * GET that resolves for every HTTP status; callers inspect `status`.
 */
export function getJson(
  http: AxiosInstance,
  url: string,
  params: Record<string, string>,
  timeoutMs: number,
): ResultAsync<AxiosResponse<unknown>, AdapterError> {
  return ResultAsync.fromPromise(
    http.get<unknown>(url, {
      params,
      timeout: timeoutMs,
      validateStatus: () => true,
    }),
    toHttpError,
  );
}

export function trimBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}
