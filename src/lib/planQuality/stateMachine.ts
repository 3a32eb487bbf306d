/**
 * セクションごとの収束ループの状態機械。
 * 遷移の可否はこの表だけで決まり、runPipeline は decideNext の結果に従って進む。
 *
 *   DRAFT → VALIDATED → ACCEPTED
 *                     → REPAIRING → DRAFT（iteration + 1）
 *                     → EXHAUSTED
 *   非終端状態 → FAILED（事実不足・バックエンド障害・中断）
 */

import type { GenerationConfig } from "./config";
import type { ValidationResult } from "./types";

// ─── 全6状態 ────────────────────────────────────────────────

export const SECTION_PHASES = ["DRAFT", "VALIDATED", "REPAIRING", "ACCEPTED", "EXHAUSTED", "FAILED"] as const;

export type SectionPhase = (typeof SECTION_PHASES)[number];

// ─── 日本語ラベル ───────────────────────────────────────────

export const PHASE_LABELS: Record<SectionPhase, string> = {
  DRAFT: "下書き",
  VALIDATED: "検証済み",
  REPAIRING: "修正中",
  ACCEPTED: "合格",
  EXHAUSTED: "打ち切り",
  FAILED: "失敗",
};

// ─── 遷移ルール ─────────────────────────────────────────────

export const TRANSITIONS: Record<SectionPhase, readonly SectionPhase[]> = {
  DRAFT: ["VALIDATED", "FAILED"],
  VALIDATED: ["ACCEPTED", "REPAIRING", "EXHAUSTED", "FAILED"],
  REPAIRING: ["DRAFT", "FAILED"],
  // 終端
  ACCEPTED: [],
  EXHAUSTED: [],
  FAILED: [],
};

export const TERMINAL_PHASES: readonly SectionPhase[] = ["ACCEPTED", "EXHAUSTED", "FAILED"];

export function isValidPhase(s: unknown): s is SectionPhase {
  return typeof s === "string" && (SECTION_PHASES as readonly string[]).includes(s);
}

export function isValidTransition(from: SectionPhase, to: SectionPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function getValidTransitions(from: SectionPhase): readonly SectionPhase[] {
  return TRANSITIONS[from];
}

export function isTerminal(phase: SectionPhase): boolean {
  return TERMINAL_PHASES.includes(phase);
}

/** 遷移表に無い遷移は実装の不具合として投げる */
export function transition(from: SectionPhase, to: SectionPhase): SectionPhase {
  if (!isValidTransition(from, to)) {
    throw new Error(`invalid section phase transition: ${from} → ${to}`);
  }
  return to;
}

// ─── VALIDATED からの分岐 ───────────────────────────────────

export type ConvergencePolicy = Pick<GenerationConfig, "qualityThreshold" | "maxIterations">;

/**
 * 合格: score ≥ qualityThreshold かつ StructuralDrift なし。
 * それ以外は iteration < maxIterations なら修正、予算切れなら打ち切り。
 */
export function decideNext(
  result: ValidationResult,
  iteration: number,
  policy: ConvergencePolicy
): "ACCEPTED" | "REPAIRING" | "EXHAUSTED" {
  const drift = result.issues.some((i) => i.category === "StructuralDrift");
  if (result.score >= policy.qualityThreshold && !drift) return "ACCEPTED";
  return iteration < policy.maxIterations ? "REPAIRING" : "EXHAUSTED";
}

/**
 * 最高スコアの候補を選ぶ。同点なら先に出たもの（書き換えの少ないもの）。
 */
export function selectBest<T extends { result: ValidationResult }>(candidates: readonly T[]): T | undefined {
  let best: T | undefined;
  for (const c of candidates) {
    if (!best || c.result.score > best.result.score) best = c;
  }
  return best;
}
