/**
 * Repair Engine: 指摘のカテゴリごとに修正戦略を当て、スロット単位で本文を直す。
 * 指摘の無いスロットには触れない。出力は常にテンプレートの全スロットを順序どおりに含む。
 */

import type { GenerationConfig } from "./config";
import { textFactValues } from "./facts";
import type { TextBackend } from "./llm";
import { buildRewritePrompt } from "./prompts";
import { containsHeading, countChars, parseSlots, renderSlots, splitSentences, type ParsedSlot } from "./slots";
import { fillPlaceholders, synthesizeSlot } from "./synthesizer";
import type { FactModel, Issue, SectionDraft, SectionTemplate, SlotSpec } from "./types";

export interface RepairContext {
  config: GenerationConfig;
  /** 未設定ならバックエンドによる書き直しは行わない */
  backend?: TextBackend;
  signal?: AbortSignal;
}

interface SpanEdit {
  start: number;
  end: number;
  replacement: string;
}

/** 後ろから適用し、既に適用した編集と重なるものは捨てる */
function applyEdits(body: string, edits: readonly SpanEdit[]): string {
  const sorted = [...edits].sort((a, b) => b.start - a.start || b.end - a.end);
  let out = body;
  let floor = Number.POSITIVE_INFINITY;
  for (const e of sorted) {
    if (e.end > floor) continue;
    out = out.slice(0, e.start) + e.replacement + out.slice(e.end);
    floor = e.start;
  }
  return normalizeBody(out);
}

function normalizeBody(body: string): string {
  return body
    .replace(/[ \t]+\n/g, "\n")
    .replace(/\n{2,}/g, "\n")
    .trim();
}

/** 本文中に現れる事実の値の範囲 [start, end) */
function factSpans(body: string, values: readonly string[]): [number, number][] {
  const spans: [number, number][] = [];
  for (const v of values) {
    for (let at = body.indexOf(v); at >= 0; at = body.indexOf(v, at + 1)) spans.push([at, at + v.length]);
  }
  return spans;
}

/** 挿入は事実の内側、置換・削除は事実と重なる場合に true */
function touchesFact(edit: SpanEdit, spans: readonly [number, number][]): boolean {
  return spans.some(([start, end]) =>
    edit.start === edit.end ? start < edit.start && edit.start < end : edit.start < end && edit.end > start
  );
}

function keepsFacts(before: string, after: string, values: readonly string[]): boolean {
  return values.every((v) => !before.includes(v) || after.includes(v));
}

function numericTokens(text: string): string {
  return (text.match(/\d+(?:[.,]\d+)*/g) ?? []).sort().join("|");
}

/** 連番で接続詞を配る（同じセクション内で同じものが続かないように） */
class ConnectiveCycle {
  private next = 0;

  constructor(private readonly connectives: readonly string[]) {}

  take(): string {
    const c = this.connectives[this.next % this.connectives.length] ?? "";
    this.next++;
    return c;
  }
}

function spanEditFor(
  body: string,
  issue: Issue,
  offset: number,
  facts: FactModel,
  config: GenerationConfig,
  connectives: ConnectiveCycle
): SpanEdit | null {
  const start = issue.location.start - offset;
  const end = issue.location.end - offset;
  if (start < 0 || end > body.length || start > end) return null;
  const matched = body.slice(start, end);

  switch (issue.category) {
    case "GenericPhrase": {
      const entry = config.genericPhrases.find((g) => g.phrase === issue.rule);
      if (!entry || matched !== entry.phrase) return null;
      return { start, end, replacement: fillPlaceholders(entry.alternative, facts) ?? "" };
    }
    case "UnnaturalPattern": {
      const entry = config.unnaturalPatterns.find((p) => p.pattern === issue.rule);
      if (entry?.rewrite === undefined) return null;
      return { start, end, replacement: matched.replace(new RegExp(entry.pattern), entry.rewrite) };
    }
    case "Repetition":
      if (issue.rule === "sentence") return { start, end, replacement: "" };
      if (issue.rule === "opening") return { start, end: start, replacement: connectives.take() };
      return null;
    default:
      return null;
  }
}

function needsBackendRewrite(issue: Issue, config: GenerationConfig): boolean {
  if (issue.category !== "UnnaturalPattern") return false;
  const entry = config.unnaturalPatterns.find((p) => p.pattern === issue.rule);
  return entry?.rewrite === undefined;
}

/** 数字も事実も含まない文を末尾側から削り、帯の中央値以下にする */
function trimTowardMidpoint(body: string, spec: SlotSpec, values: readonly string[]): string {
  const mid = Math.floor((spec.minChars + spec.maxChars) / 2);
  let current = body;
  while (countChars(current) > mid) {
    const sentences = splitSentences(current);
    if (sentences.length <= 1) break;
    let victim = -1;
    for (let i = sentences.length - 1; i >= 0; i--) {
      const t = sentences[i].text;
      if (!/[0-9０-９]/.test(t) && !values.some((v) => t.includes(v))) {
        victim = i;
        break;
      }
    }
    if (victim < 0) break;
    const s = sentences[victim];
    current = normalizeBody(current.slice(0, s.start) + current.slice(s.end));
  }
  return current;
}

function expandTowardBand(body: string, spec: SlotSpec, facts: FactModel, template: SectionTemplate): string {
  const supplement = spec.supplement ? fillPlaceholders(spec.supplement, facts) : null;
  const appended = supplement ? `${body}${supplement}` : body;
  const resynthesized = synthesizeSlot(facts, template, spec.role);
  return countChars(resynthesized) > countChars(appended) ? resynthesized : appended;
}

async function repairSlot(
  original: ParsedSlot,
  spec: SlotSpec,
  issues: readonly Issue[],
  facts: FactModel,
  template: SectionTemplate,
  ctx: RepairContext,
  connectives: ConnectiveCycle
): Promise<string> {
  const values = textFactValues(facts);
  const spans = factSpans(original.body, values);
  const edits = issues
    .map((i) => spanEditFor(original.body, i, original.bodyStart, facts, ctx.config, connectives))
    .filter((e): e is SpanEdit => e !== null && !touchesFact(e, spans));
  let body = edits.length > 0 ? applyEdits(original.body, edits) : original.body;

  const pending = issues.filter((i) => needsBackendRewrite(i, ctx.config));
  if (pending.length > 0 && ctx.backend) {
    const request = buildRewritePrompt(spec.label, body, pending);
    const rewritten = normalizeBody(await ctx.backend.generate(request, ctx.signal));
    if (
      rewritten &&
      !containsHeading(rewritten) &&
      numericTokens(rewritten) === numericTokens(body) &&
      keepsFacts(body, rewritten, values)
    ) {
      body = rewritten;
    }
  }

  if (issues.some((i) => i.category === "LengthViolation")) {
    const n = countChars(body);
    if (n < spec.minChars) body = expandTowardBand(body, spec, facts, template);
    else if (n > spec.maxChars) body = trimTowardMidpoint(body, spec, values);
  }

  return body;
}

/**
 * 下書きを修正して iteration + 1 の下書きを返す。
 * 構造の崩れはテンプレート順に組み直し、欠けた・空のスロットだけを作り直す。
 * 戦略の無い指摘と、事実の値に掛かる指摘はそのまま残り、次の検証でも検出される。
 */
export async function repair(
  draft: SectionDraft,
  issues: readonly Issue[],
  facts: FactModel,
  template: SectionTemplate,
  ctx: RepairContext
): Promise<SectionDraft> {
  const parsed = parseSlots(draft.text);
  const connectives = new ConnectiveCycle(ctx.config.connectives);

  const slots: { label: string; body: string }[] = [];
  for (const spec of template.slots) {
    const original = parsed.slots.find((s) => s.label === spec.label);
    if (!original || !original.body) {
      slots.push({ label: spec.label, body: synthesizeSlot(facts, template, spec.role) });
      continue;
    }
    const own = issues.filter((i) => i.location.slot === spec.role && i.category !== "StructuralDrift");
    const body =
      own.length > 0 ? await repairSlot(original, spec, own, facts, template, ctx, connectives) : original.body;
    slots.push({ label: spec.label, body });
  }

  return {
    sectionId: draft.sectionId,
    text: renderSlots(slots),
    iteration: draft.iteration + 1,
    facts: draft.facts,
    frozen: false,
  };
}
