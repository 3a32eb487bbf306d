/**
 * バックエンド呼び出しの耐障害層: 1 回ごとのタイムアウト、一時的障害の再試行（固定スケジュール + ジッター）、
 * 上限到達時の BackendUnavailableError への格上げ。呼び出し元の中断は再試行しない。
 * この再試行は品質の反復回数（maxIterations）とは別勘定。
 */

import { setTimeout as delay } from "node:timers/promises";
import type { GenerationConfig } from "./config";
import { BackendTransientError, BackendUnavailableError, GenerationAbortedError, throwIfAborted } from "./errors";
import type { TextBackend } from "./llm";

export type RetryPolicy = GenerationConfig["retry"];

export interface RetryHooks {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** [0, 1) の乱数。ジッター計算用 */
  random?: () => number;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

const NETWORK_ERROR_PATTERNS = ["econnreset", "econnrefused", "etimedout", "socket hang up", "network", "fetch failed"];

/** 再試行してよい失敗か */
export function isTransientError(e: unknown): boolean {
  if (e instanceof BackendTransientError) return true;
  if (!(e instanceof Error)) return false;
  if (e.name === "TimeoutError") return true;
  const msg = e.message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((p) => msg.includes(p));
}

/** attempt 回目（0 始まり）の待ち時間。スケジュールを使い切ったら最後の値を使う */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const schedule = policy.backoffMs;
  const base = schedule[Math.min(attempt, schedule.length - 1)] ?? 0;
  const factor = 1 + policy.jitter * (2 * random() - 1);
  return Math.max(0, Math.round(base * factor));
}

async function sleepWithSignal(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (e) {
    throwIfAborted(signal);
    throw e;
  }
}

/**
 * fn を再試行付きで呼ぶ。fn には呼び出し元の中断とタイムアウトを束ねた signal を渡す。
 */
export async function callWithRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? sleepWithSignal;
  for (let attempt = 0; ; attempt++) {
    throwIfAborted(signal);
    const timeout = AbortSignal.timeout(policy.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
    try {
      return await fn(combined);
    } catch (e) {
      if (signal?.aborted) throw new GenerationAbortedError();
      if (!isTransientError(e)) throw e;
      if (attempt >= policy.maxRetries) throw new BackendUnavailableError(attempt + 1, e);
      const wait = backoffDelay(policy, attempt, hooks.random);
      hooks.onRetry?.(attempt + 1, wait, e);
      await sleep(wait, signal);
    }
  }
}

export function createResilientBackend(backend: TextBackend, policy: RetryPolicy, hooks: RetryHooks = {}): TextBackend {
  return {
    generate(request, signal) {
      return callWithRetry((s) => backend.generate(request, s), policy, signal, hooks);
    },
  };
}
