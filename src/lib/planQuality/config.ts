/**
 * 生成設定（合格閾値・反復上限・減点重み・語句カタログ・バックエンド再試行）。
 * 1 回の実行ごとに読み込んで凍結し、Detector / Repair Engine へ明示的に渡す。
 */

import { z } from "zod";
import catalogData from "./data/defectCatalog.json";
import { deepFreeze } from "./facts";
import type { SectionId } from "./types";

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern, "g");
    return true;
  } catch {
    return false;
  }
}

const weight = z.number().nonnegative();
const chars = z.number().int().nonnegative();

const SectionMinCharsSchema = z.object({
  current_state: chars,
  management_issues: chars,
  motivation: chars,
  before_after: chars,
  effects: chars,
  productivity: chars,
} satisfies Record<SectionId, typeof chars>);

export const GenerationConfigSchema = z.object({
  qualityThreshold: z.number().min(0).max(1),
  maxIterations: z.number().int().nonnegative(),
  concurrency: z.number().int().positive(),
  penaltyWeights: z.object({
    StructuralDrift: weight,
    LengthViolation: weight,
    Repetition: weight,
    GenericPhrase: weight,
    UnnaturalPattern: weight,
    RequirementViolation: weight,
  }),
  /** セクション本文（見出しを除く）の最低文字数。文書全体の検証で使う */
  sectionMinChars: SectionMinCharsSchema,
  /** 全セクションそろった文書の最低文字数 */
  minTotalChars: chars,
  requirements: z.object({
    minAddedValueGrowthPercent: z.number(),
    minSalaryGrowthPercent: z.number(),
  }),
  repetition: z.object({
    openingLength: z.number().int().positive(),
    maxOpeningsPerSection: z.number().int().positive(),
    maxOpeningsPerDocument: z.number().int().positive(),
  }),
  genericPhrases: z.array(z.object({ phrase: z.string().min(1), alternative: z.string() })),
  unnaturalPatterns: z.array(
    z.object({
      pattern: z.string().min(1).refine(isValidRegex, { message: "invalid regular expression" }),
      description: z.string(),
      rewrite: z.string().optional(),
    })
  ),
  connectives: z.array(z.string().min(1)).min(1),
  retry: z.object({
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    backoffMs: z.array(z.number().nonnegative()).min(1),
    jitter: z.number().min(0).max(1),
  }),
});

export type GenerationConfig = Readonly<z.infer<typeof GenerationConfigSchema>>;
type ConfigShape = z.infer<typeof GenerationConfigSchema>;

export interface GenerationConfigOverrides {
  qualityThreshold?: number;
  maxIterations?: number;
  concurrency?: number;
  penaltyWeights?: Partial<ConfigShape["penaltyWeights"]>;
  sectionMinChars?: Partial<ConfigShape["sectionMinChars"]>;
  minTotalChars?: number;
  requirements?: Partial<ConfigShape["requirements"]>;
  repetition?: Partial<ConfigShape["repetition"]>;
  genericPhrases?: ConfigShape["genericPhrases"];
  unnaturalPatterns?: ConfigShape["unnaturalPatterns"];
  connectives?: ConfigShape["connectives"];
  retry?: Partial<ConfigShape["retry"]>;
}

/**
 * 同梱カタログに上書きを重ねて検証し、凍結した設定を返す。不正な値は ZodError を投げる。
 */
export function loadGenerationConfig(overrides: GenerationConfigOverrides = {}): GenerationConfig {
  const base = GenerationConfigSchema.parse(catalogData);
  const given = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined));
  const merged = GenerationConfigSchema.parse({
    ...base,
    ...given,
    penaltyWeights: { ...base.penaltyWeights, ...overrides.penaltyWeights },
    sectionMinChars: { ...base.sectionMinChars, ...overrides.sectionMinChars },
    requirements: { ...base.requirements, ...overrides.requirements },
    repetition: { ...base.repetition, ...overrides.repetition },
    retry: { ...base.retry, ...overrides.retry },
  });
  return deepFreeze(merged);
}
