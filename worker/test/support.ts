import type { Clock, FetchLike } from "../src/lib/types.js";

export interface FakeClock extends Clock {
  sleeps: number[];
  advance(ms: number): void;
}

/** `sleep` resolves at once and moves `now` forward. */
export function fakeClock(start = 0): FakeClock {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += Math.max(0, ms);
    },
    advance: (ms: number) => {
      now += ms;
    },
  };
}

export interface FetchCall {
  url: string;
  init?: RequestInit;
}

export function fakeFetch(
  handler: (url: string, init?: RequestInit) => Response | Promise<Response>
): { fetch: FetchLike; calls: FetchCall[] } {
  const calls: FetchCall[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return handler(url, init);
  };
  return { fetch: fetchImpl, calls };
}

export function html(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/html; charset=utf-8" },
  });
}

export function text(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "text/plain" },
  });
}
