/**
 * Fact Model: fact key の定義と入力（ヒアリングデータ）の正規化。
 * テンプレートは事実を fact key（"numbers.hourlyWage" 等）でのみ参照する。
 */

import { z } from "zod";
import { MissingFactError } from "./errors";
import { processTemplateFor, resolveIndustryTag } from "./templates";
import { INDUSTRY_TAGS, type FactModel, type ProcessStep } from "./types";

const TEXT_FACTS = {
  "company.name": (f: FactModel) => f.company.name,
  "company.industry": (f: FactModel) => f.company.industry,
  "company.prefecture": (f: FactModel) => f.company.prefecture,
  "company.establishedDate": (f: FactModel) => f.company.establishedDate,
  "company.businessDescription": (f: FactModel) => f.company.businessDescription,
  "equipment.name": (f: FactModel) => f.equipment.name,
  "equipment.features": (f: FactModel) => f.equipment.features,
  "labor.shortageTasks": (f: FactModel) => f.labor.shortageTasks,
  "labor.recruitmentPeriod": (f: FactModel) => f.labor.recruitmentPeriod,
  "narrative.motivationBackground": (f: FactModel) => f.narrative.motivationBackground,
  "narrative.timeUtilizationPlan": (f: FactModel) => f.narrative.timeUtilizationPlan,
} satisfies Record<string, (f: FactModel) => string | undefined>;

const NUMBER_FACTS = {
  "company.employeeCount": (f: FactModel) => f.company.employeeCount,
  "company.officerCount": (f: FactModel) => f.company.officerCount,
  "numbers.growthRate": (f: FactModel) => f.numbers.growthRate,
  "numbers.salaryGrowthRate": (f: FactModel) => f.numbers.salaryGrowthRate,
  "numbers.hourlyWage": (f: FactModel) => f.numbers.hourlyWage,
  "numbers.workingDaysPerMonth": (f: FactModel) => f.numbers.workingDaysPerMonth,
  "numbers.overtimeHours": (f: FactModel) => f.numbers.overtimeHours,
  "numbers.currentHours": (f: FactModel) => f.numbers.currentHours,
  "numbers.targetHours": (f: FactModel) => f.numbers.targetHours,
  "numbers.revenue": (f: FactModel) => f.numbers.revenue,
  "numbers.operatingProfit": (f: FactModel) => f.numbers.operatingProfit,
  "numbers.laborCost": (f: FactModel) => f.numbers.laborCost,
  "numbers.depreciation": (f: FactModel) => f.numbers.depreciation,
  "numbers.totalInvestment": (f: FactModel) => f.numbers.totalInvestment,
  "numbers.jobOpeningsRatio": (f: FactModel) => f.numbers.jobOpeningsRatio,
  "numbers.currentWorkers": (f: FactModel) => f.numbers.currentWorkers,
  "numbers.desiredWorkers": (f: FactModel) => f.numbers.desiredWorkers,
  "labor.applications": (f: FactModel) => f.labor.applications,
  "labor.hired": (f: FactModel) => f.labor.hired,
} satisfies Record<string, (f: FactModel) => number | undefined>;

export type TextFactKey = keyof typeof TEXT_FACTS;
export type NumberFactKey = keyof typeof NUMBER_FACTS;
export type FactKey = TextFactKey | NumberFactKey;

export function isTextFactKey(key: string): key is TextFactKey {
  return Object.prototype.hasOwnProperty.call(TEXT_FACTS, key);
}

export function isNumberFactKey(key: string): key is NumberFactKey {
  return Object.prototype.hasOwnProperty.call(NUMBER_FACTS, key);
}

export function isFactKey(key: string): key is FactKey {
  return isTextFactKey(key) || isNumberFactKey(key);
}

export const FACT_KEYS: readonly FactKey[] = [
  ...Object.keys(TEXT_FACTS).filter(isTextFactKey),
  ...Object.keys(NUMBER_FACTS).filter(isNumberFactKey),
];

export function readFact(facts: FactModel, key: FactKey): string | number | undefined {
  return isTextFactKey(key) ? TEXT_FACTS[key](facts) : NUMBER_FACTS[key](facts);
}

/** 空文字・非有限数は「無い」とみなす */
export function hasFact(facts: FactModel, key: FactKey): boolean {
  const v = readFact(facts, key);
  if (typeof v === "string") return v.trim().length > 0;
  return typeof v === "number" && Number.isFinite(v);
}

/**
 * 本文に引用されうる文字列の事実（テキスト fact と工程の名称・作業内容）。
 * Repair Engine はこれらの出現範囲を書き換えない。
 */
export function textFactValues(facts: FactModel): string[] {
  const values = [
    ...Object.keys(TEXT_FACTS)
      .filter(isTextFactKey)
      .map((k) => TEXT_FACTS[k](facts)),
    ...facts.processSteps.flatMap((s) => [s.name, s.before, s.after]),
  ];
  return [...new Set(values.filter((v): v is string => typeof v === "string" && v.trim().length > 0))];
}

/**
 * Synthesizer 用の読み取り口。必須の事実が無ければ MissingFactError を投げる。
 */
export interface FactReader {
  text(key: TextFactKey): string;
  num(key: NumberFactKey): number;
  optionalText(key: TextFactKey): string | undefined;
  readonly steps: readonly Readonly<ProcessStep>[];
}

export function createFactReader(
  facts: FactModel,
  fallbackSteps: readonly Readonly<ProcessStep>[],
  sectionId?: string
): FactReader {
  return {
    text(key) {
      const v = TEXT_FACTS[key](facts);
      if (v === undefined || !v.trim()) throw new MissingFactError(key, sectionId);
      return v;
    },
    num(key) {
      const v = NUMBER_FACTS[key](facts);
      if (v === undefined || !Number.isFinite(v)) throw new MissingFactError(key, sectionId);
      return v;
    },
    optionalText(key) {
      const v = TEXT_FACTS[key](facts);
      return v && v.trim() ? v : undefined;
    },
    steps: facts.processSteps.length > 0 ? facts.processSteps : fallbackSteps,
  };
}

// ─── Fact source（ヒアリングデータ → FactModel） ─────────────

/** 改行は空白 1 つにまとめる（値の中の行が【…】見出しとして読まれないように） */
function singleLine(v: string): string {
  return v.replace(/\s*[\r\n]+\s*/g, " ").trim();
}

const text = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? singleLine(v) : undefined));
const num = z
  .number()
  .finite()
  .nullish()
  .transform((v) => v ?? undefined);

const ProcessStepInputSchema = z.object({
  name: z.string().transform(singleLine).pipe(z.string().min(1)),
  before: z.string().transform(singleLine),
  after: z.string().transform(singleLine),
  beforeMinutes: z.number().nonnegative(),
  afterMinutes: z.number().nonnegative(),
});

export const FactInputSchema = z.object({
  company: z
    .object({
      name: text,
      industry: text,
      prefecture: text,
      establishedDate: text,
      businessDescription: text,
      employeeCount: num,
      officerCount: num,
    })
    .default({}),
  industryTag: z.enum(INDUSTRY_TAGS).optional(),
  numbers: z
    .object({
      growthRate: num,
      salaryGrowthRate: num,
      hourlyWage: num,
      workingDaysPerMonth: num,
      overtimeHours: num,
      currentHours: num,
      targetHours: num,
      revenue: num,
      operatingProfit: num,
      laborCost: num,
      depreciation: num,
      totalInvestment: num,
      jobOpeningsRatio: num,
      currentWorkers: num,
      desiredWorkers: num,
    })
    .default({}),
  equipment: z.object({ name: text, features: text }).default({}),
  labor: z
    .object({
      shortageTasks: text,
      recruitmentPeriod: text,
      applications: num,
      hired: num,
    })
    .default({}),
  narrative: z.object({ motivationBackground: text, timeUtilizationPlan: text }).default({}),
  processSteps: z.array(ProcessStepInputSchema).default([]),
});

export type FactInput = z.input<typeof FactInputSchema>;

export type FactSourceResult =
  | { ok: true; facts: FactModel; unavailable: FactKey[] }
  | { ok: false; errors: string[] };

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * ヒアリングデータを検証して凍結済み FactModel を作る。
 * 業種タグは業種名から推定し、工程が無ければ業種別テンプレートで補う。
 * 取得できなかった fact key は unavailable として明示的に返す。
 */
export function parseFactModel(raw: unknown): FactSourceResult {
  const parsed = FactInputSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((i) => `${i.path.join(".") || "facts"}: ${i.message}`),
    };
  }
  const input = parsed.data;
  const industryTag = input.industryTag ?? resolveIndustryTag(input.company.industry ?? "");
  const processSteps =
    input.processSteps.length > 0 ? input.processSteps : processTemplateFor(industryTag).steps.map((s) => ({ ...s }));

  const facts: FactModel = deepFreeze({
    company: input.company,
    industryTag,
    numbers: input.numbers,
    equipment: input.equipment,
    labor: input.labor,
    narrative: input.narrative,
    processSteps,
  });
  const unavailable = FACT_KEYS.filter((k) => !hasFact(facts, k));
  return { ok: true, facts, unavailable };
}
