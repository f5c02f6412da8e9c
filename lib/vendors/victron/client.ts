/**
 * Victron VRM API Client
 *
 * Read-only access to the VRM v2 REST API using a personal access token.
 * Every request shares one overall time budget measured from construction,
 * so a run never hangs no matter how many calls it makes.
 */

import nodeFetch, { FetchError } from "node-fetch";
import type { RequestInit, Response } from "node-fetch";
import { ERROR_MESSAGES, USER_AGENT, type VrmConfig } from "@/config";
import { isDebug } from "@/lib/env";
import {
  extractAlarmRecords,
  installationRecords,
  statsRecords,
  userIdFrom,
} from "./parsing";
import type {
  QueryParams,
  VrmAlarmRecord,
  VrmInstallation,
  VrmStatsRecords,
} from "./types";

export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export class VrmApiError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public response?: string,
  ) {
    super(message);
    this.name = "VrmApiError";
  }
}

export class VrmAuthError extends VrmApiError {
  constructor(message: string = ERROR_MESSAGES.AUTH_FAILED) {
    super(message, 401);
    this.name = "VrmAuthError";
  }
}

export class VrmTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VrmTimeoutError";
  }
}

export interface VrmClientOptions {
  fetch?: FetchFunction;
  sleep?: (ms: number) => Promise<void>;
  monotonicNow?: () => number; // milliseconds
}

const MIN_REQUEST_TIMEOUT_MS = 500;
const MIN_BACKOFF_MS = 100;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Network failures and timeouts are worth another attempt; HTTP errors and
 * unparseable bodies are not
 */
function isTransientError(error: unknown): boolean {
  return error instanceof FetchError && error.type !== "invalid-json";
}

export class VrmClient {
  private readonly config: VrmConfig;
  private readonly fetchFn: FetchFunction;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly monotonicNow: () => number;
  private readonly startedAt: number;

  constructor(config: VrmConfig, options: VrmClientOptions = {}) {
    this.config = config;
    this.fetchFn = options.fetch ?? nodeFetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
    this.startedAt = this.monotonicNow();
  }

  /**
   * Milliseconds left in the overall budget
   */
  remainingBudgetMs(): number {
    return this.config.totalBudgetMs - (this.monotonicNow() - this.startedAt);
  }

  private headers(): Record<string, string> {
    return {
      "X-Authorization": `Token ${this.config.token}`,
      Accept: "application/json",
      "User-Agent": USER_AGENT,
    };
  }

  private buildUrl(path: string, params?: QueryParams): string {
    const base = path.startsWith("http") ? path : `${this.config.baseUrl}${path}`;
    if (!params || Object.keys(params).length === 0) return base;
    return `${base}?${new URLSearchParams(params).toString()}`;
  }

  /**
   * GET with bounded retries and overall-budget awareness
   */
  async get(path: string, params?: QueryParams): Promise<unknown> {
    const url = this.buildUrl(path, params);
    let attempt = 0;

    while (attempt < this.config.retries) {
      const remaining = this.remainingBudgetMs();
      if (remaining <= 0) {
        throw new VrmTimeoutError(
          `${ERROR_MESSAGES.BUDGET_EXCEEDED} (${this.config.totalBudgetMs / 1000}s) before calling ${url}`,
        );
      }

      // Per-request time split between connect and read, bounded by what is left
      const connectMs = Math.min(
        this.config.connectTimeoutMs,
        Math.max(MIN_REQUEST_TIMEOUT_MS, remaining / 2),
      );
      const readMs = Math.min(
        this.config.readTimeoutMs,
        Math.max(MIN_REQUEST_TIMEOUT_MS, remaining / 2),
      );

      try {
        return await this.request(url, Math.round(connectMs + readMs));
      } catch (error) {
        if (!isTransientError(error)) throw error;

        attempt++;
        if (attempt >= this.config.retries) throw error;

        const backoffMs = Math.min(
          this.config.backoffBaseMs * 2 ** (attempt - 1),
          Math.max(MIN_BACKOFF_MS, remaining / 4),
        );
        console.error(
          `[VRM] ${error instanceof Error ? error.message : String(error)}; retrying in ${Math.round(backoffMs)}ms (attempt ${attempt + 1}/${this.config.retries})`,
        );
        await this.sleep(backoffMs);
      }
    }

    throw new VrmTimeoutError(`Failed to GET ${url} within retry budget`);
  }

  private async request(url: string, timeoutMs: number): Promise<unknown> {
    if (isDebug()) {
      console.error(`[VRM] GET ${url} (timeout ${timeoutMs}ms)`);
    }

    const response = await this.fetchFn(url, {
      method: "GET",
      headers: this.headers(),
      redirect: "manual",
      timeout: timeoutMs,
    });

    if (response.status === 401) {
      throw new VrmAuthError();
    }

    if (!response.ok) {
      const errorText = await response.text();
      const redirected =
        response.status >= 300 && response.status < 400 ? " (redirect not followed)" : "";
      throw new VrmApiError(
        `VRM API error: ${response.status} ${response.statusText} for ${url}${redirected}`,
        response.status,
        errorText,
      );
    }

    const body: unknown = await response.json();
    return body;
  }

  /**
   * Id of the user owning the token, or null when the response has none
   */
  async getCurrentUserId(): Promise<number | null> {
    return userIdFrom(await this.get("/users/me"));
  }

  async listInstallations(userId: number): Promise<VrmInstallation[]> {
    return installationRecords(await this.get(`/users/${userId}/installations`));
  }

  async getVenusStats(siteId: number): Promise<VrmStatsRecords> {
    return statsRecords(
      await this.get(`/installations/${siteId}/stats`, { type: "venus" }),
    );
  }

  async getActiveAlarms(siteId: number): Promise<VrmAlarmRecord[]> {
    return extractAlarmRecords(
      await this.get(`/installations/${siteId}/alarms`, { active: "true" }),
    );
  }
}
