/**
 * パイプライン実行時のサーバーログ（どの指摘で落ちたか、修正回数、最終状態、バックエンド再試行）。
 */

import { PHASE_LABELS, type SectionPhase } from "./stateMachine";
import type { SectionId, SectionOutcome, ValidationResult } from "./types";

export interface LogContext {
  logAttempt(sectionId: SectionId, iteration: number, result: ValidationResult, next: SectionPhase): void;
  logBackendRetry(attempt: number, delayMs: number, error: unknown): void;
  logFinal(outcome: SectionOutcome): void;
  logDocument(runId: string, result: ValidationResult): void;
}

const FINAL_PHASE: Record<SectionOutcome["status"], SectionPhase> = {
  accepted: "ACCEPTED",
  exhausted: "EXHAUSTED",
  failed: "FAILED",
};

function phase(p: SectionPhase): string {
  return `${p}（${PHASE_LABELS[p]}）`;
}

function countByCategory(result: ValidationResult): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const i of result.issues) counts[i.category] = (counts[i.category] ?? 0) + 1;
  return counts;
}

export function createServerLogContext(): LogContext {
  return {
    logAttempt(sectionId, iteration, result, next) {
      const prefix = `[${sectionId}] iteration=${iteration} score=${result.score}`;
      if (result.issues.length > 0) {
        console.warn(`${prefix} issues=${result.issues.length} next=${phase(next)}`, countByCategory(result));
      } else {
        console.info(`${prefix} next=${phase(next)}`);
      }
    },
    logBackendRetry(attempt, delayMs, error) {
      const msg = error instanceof Error ? error.message : String(error);
      console.warn(`[backend] retry=${attempt} delayMs=${delayMs}`, msg);
    },
    logFinal(outcome) {
      const final = phase(FINAL_PHASE[outcome.status]);
      if (outcome.status === "failed") {
        console.warn(`[${outcome.sectionId}] final=${final} code=${outcome.error.code}`, outcome.error.message);
        return;
      }
      console.info(
        `[${outcome.sectionId}] final=${final} iterations=${outcome.iterations} score=${outcome.result.score}`
      );
    },
    logDocument(runId, result) {
      const prefix = `[document] run=${runId} score=${result.score}`;
      if (result.issues.length > 0) console.warn(`${prefix} residualIssues=${result.issues.length}`);
      else console.info(prefix);
    },
  };
}
