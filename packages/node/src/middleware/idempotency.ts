/**
 * Idempotency middleware.
 *
 * Caches successful POST responses by Idempotency-Key header, scoped to the
 * request path. A client retrying a deposit or withdrawal after a lost
 * response gets the first response back instead of a second operation.
 */

import type { MiddlewareHandler } from "hono";
import type { Clock } from "@tidewater/runtime";
import { systemClock } from "@tidewater/runtime";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();

  constructor(
    private readonly _ttlMs: number = 86_400_000,
    private readonly _clock: Clock = systemClock,
  ) {}

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._expired(entry)) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  /** Stores the response and drops every expired entry */
  set(key: string, response: CachedResponse): void {
    for (const [cached, entry] of this._cache) {
      if (this._expired(entry)) this._cache.delete(cached);
    }
    this._cache.set(key, response);
  }

  get size(): number {
    return this._cache.size;
  }

  private _expired(entry: CachedResponse): boolean {
    return this._clock.now() - entry.cachedAt > this._ttlMs;
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export function idempotencyMiddleware(
  store: IdempotencyStore,
  clock: Clock = systemClock,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const scopedKey = `${c.req.path}\u0000${idempotencyKey}`;
    const cached = store.get(scopedKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
      });
    }

    await next();

    if (c.res.status < 400) {
      const cloned = c.res.clone();
      const headers: Record<string, string> = {};
      cloned.headers.forEach((value, key) => {
        headers[key] = value;
      });

      store.set(scopedKey, {
        status: cloned.status,
        body: await cloned.text(),
        headers,
        cachedAt: clock.now(),
      });
    }
  };
}
