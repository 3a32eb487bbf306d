/**
 * 生成パイプライン実行（synthesize → validate → 最大 maxIterations 回 repair → 文書全体の検証）。
 * セクションは p-limit で並行に収束させ、全セクションが終端に達してから文書全体の検証を行う。
 */

import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import { loadGenerationConfig, type GenerationConfig } from "./config";
import { throwIfAborted, toSectionFailure } from "./errors";
import type { TextBackend } from "./llm";
import { repair } from "./repair";
import { createResilientBackend, type RetryHooks } from "./resilience";
import { createServerLogContext, type LogContext } from "./runPipelineLog";
import { decideNext, selectBest, transition, type SectionPhase } from "./stateMachine";
import { synthesize } from "./synthesizer";
import { builtInTemplateStore, type TemplateStore } from "./templates";
import type {
  AttemptRecord,
  FactModel,
  GenerationRun,
  SectionDraft,
  SectionId,
  SectionOutcome,
  SectionTemplate,
  ValidationResult,
} from "./types";
import { validate, validateDocument, type SectionText } from "./validator";

export type SectionTexts = Partial<Record<SectionId, string>>;

/** 確定したセクション本文を受け取り、Word / Excel 等の成果物を組み立てる外部協力者 */
export interface DocumentAssembler {
  assemble(texts: SectionTexts, run: GenerationRun): Promise<void> | void;
}

export interface RunOptions {
  config?: GenerationConfig;
  backend?: TextBackend;
  templates?: TemplateStore;
  signal?: AbortSignal;
  log?: LogContext;
  assembler?: DocumentAssembler;
  /** バックエンド再試行の待機・乱数の差し替え（テスト用） */
  retryHooks?: Pick<RetryHooks, "sleep" | "random">;
  runId?: string;
}

export interface ConvergeOptions {
  config: GenerationConfig;
  backend?: TextBackend;
  signal?: AbortSignal;
  log: LogContext;
}

/**
 * 1 セクションを終端状態まで進める。例外は投げず、致命的エラーは failed として返す。
 */
export async function convergeSection(
  facts: FactModel,
  template: SectionTemplate,
  options: ConvergeOptions
): Promise<SectionOutcome> {
  const { config, backend, signal, log } = options;
  const attempts: AttemptRecord[] = [];
  const history: { draft: SectionDraft; result: ValidationResult }[] = [];
  let phase: SectionPhase = "DRAFT";

  try {
    throwIfAborted(signal);
    let draft = synthesize(facts, template);
    for (;;) {
      const result = validate(draft.text, template, config);
      phase = transition(phase, "VALIDATED");
      attempts.push({ iteration: draft.iteration, score: result.score, issueCount: result.issues.length });
      history.push({ draft, result });

      const next = decideNext(result, draft.iteration, config);
      log.logAttempt(template.id, draft.iteration, result, next);
      phase = transition(phase, next);

      if (next === "ACCEPTED") {
        const accepted = Object.freeze({ ...draft, frozen: true });
        return { status: "accepted", sectionId: template.id, draft: accepted, result, iterations: draft.iteration, attempts };
      }
      if (next === "EXHAUSTED") {
        const best = selectBest(history) ?? { draft, result };
        return {
          status: "exhausted",
          sectionId: template.id,
          draft: Object.freeze({ ...best.draft, frozen: true }),
          result: best.result,
          iterations: draft.iteration,
          attempts,
        };
      }

      throwIfAborted(signal);
      draft = await repair(draft, result.issues, facts, template, { config, backend, signal });
      phase = transition(phase, "DRAFT");
    }
  } catch (e) {
    transition(phase, "FAILED");
    return {
      status: "failed",
      sectionId: template.id,
      error: toSectionFailure(e),
      iterations: attempts.at(-1)?.iteration ?? 0,
      attempts,
    };
  }
}

/** accepted / exhausted のセクション本文を sectionId で引ける形にする */
export function collectSectionTexts(sections: readonly SectionOutcome[]): SectionTexts {
  const texts: SectionTexts = {};
  for (const s of sections) {
    if (s.status !== "failed") texts[s.sectionId] = s.draft.text;
  }
  return texts;
}

/**
 * 指定セクションを生成・検証・修正し、GenerationRun を返す。
 * 重複した sectionId は 1 つにまとめ、結果は指定順に並ぶ。
 * 中断された場合、合格済みのセクションは残し、それ以外は ABORTED の failed になる。
 */
export async function run(
  facts: FactModel,
  sectionIds: readonly SectionId[],
  options: RunOptions = {}
): Promise<GenerationRun> {
  const config = options.config ?? loadGenerationConfig();
  const log = options.log ?? createServerLogContext();
  const templates = options.templates ?? builtInTemplateStore;
  const backend = options.backend
    ? createResilientBackend(options.backend, config.retry, {
        ...options.retryHooks,
        onRetry: (attempt, delayMs, error) => log.logBackendRetry(attempt, delayMs, error),
      })
    : undefined;

  const limit = pLimit(config.concurrency);
  const ids = [...new Set(sectionIds)];

  const sections = await Promise.all(
    ids.map((sectionId) =>
      limit(async (): Promise<SectionOutcome> => {
        let outcome: SectionOutcome;
        try {
          throwIfAborted(options.signal);
          const template = templates.getTemplate(sectionId, facts.industryTag);
          outcome = await convergeSection(facts, template, { config, backend, signal: options.signal, log });
        } catch (e) {
          outcome = { status: "failed", sectionId, error: toSectionFailure(e), iterations: 0, attempts: [] };
        }
        log.logFinal(outcome);
        return outcome;
      })
    )
  );

  const texts = collectSectionTexts(sections);
  const documentInput: SectionText[] = ids.flatMap((sectionId) => {
    const text = texts[sectionId];
    return text === undefined ? [] : [{ sectionId, text }];
  });
  const documentResult = validateDocument(documentInput, config, facts);

  const generationRun: GenerationRun = {
    id: options.runId ?? randomUUID(),
    facts,
    config,
    sections,
    documentResult,
    residualIssues: documentResult.issues,
  };
  log.logDocument(generationRun.id, documentResult);

  if (options.assembler) await options.assembler.assemble(texts, generationRun);
  return generationRun;
}
