/**
 * 生成パイプラインのエラー分類。
 * セクション単位の致命的エラーはそのセクションだけを止め、兄弟セクションは続行する。
 * 品質の打ち切り（EXHAUSTED）はエラーではなく終端状態として扱う。
 */

import type { SectionFailure } from "./types";

export class PlanGenerationError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PlanGenerationError";
    this.code = code;
  }
}

/** テンプレートが参照する事実が FactModel に無い（入力不足） */
export class MissingFactError extends PlanGenerationError {
  readonly field: string;

  constructor(field: string, sectionId?: string) {
    super(
      "MISSING_FACT",
      sectionId ? `fact '${field}' is required by section '${sectionId}'` : `fact '${field}' is required`
    );
    this.name = "MissingFactError";
    this.field = field;
  }
}

/** テンプレートが FactModel のスキーマに存在しない fact を参照している（設定の不具合） */
export class TemplateMismatchError extends PlanGenerationError {
  readonly field: string;

  constructor(sectionId: string, field: string) {
    super("TEMPLATE_MISMATCH", `template '${sectionId}' references unknown fact '${field}'`);
    this.name = "TemplateMismatchError";
    this.field = field;
  }
}

/** 一時的なバックエンド障害（ネットワーク・レート制限・5xx）。再試行対象 */
export class BackendTransientError extends PlanGenerationError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("BACKEND_TRANSIENT", message);
    this.name = "BackendTransientError";
    this.status = status;
  }
}

/** 再試行を使い切った、または再試行不能なバックエンド障害 */
export class BackendUnavailableError extends PlanGenerationError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("BACKEND_UNAVAILABLE", `text backend unavailable after ${attempts} attempt(s): ${detail}`, { cause });
    this.name = "BackendUnavailableError";
    this.attempts = attempts;
  }
}

export class GenerationAbortedError extends PlanGenerationError {
  constructor() {
    super("ABORTED", "generation run was aborted");
    this.name = "GenerationAbortedError";
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new GenerationAbortedError();
}

/**
 * 例外を GenerationRun に載せられるプレーンな値へ変換する。
 */
export function toSectionFailure(e: unknown): SectionFailure {
  if (e instanceof MissingFactError || e instanceof TemplateMismatchError) {
    return { name: e.name, code: e.code, message: e.message, field: e.field };
  }
  if (e instanceof PlanGenerationError) {
    return { name: e.name, code: e.code, message: e.message };
  }
  const message = e instanceof Error ? e.message : String(e);
  return { name: e instanceof Error ? e.name : "Error", code: "UNEXPECTED", message };
}
