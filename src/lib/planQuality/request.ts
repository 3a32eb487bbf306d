/**
 * POST /api/plan/run の body 検証。
 *
 * Body: { facts: object, sections?: SectionId[], qualityThreshold?: number, maxIterations?: number }
 */

import { z } from "zod";
import type { GenerationConfigOverrides } from "./config";
import { FACT_KEYS, parseFactModel, type FactKey } from "./facts";
import { SECTION_IDS, type FactModel, type SectionId } from "./types";

export const RunRequestSchema = z.object({
  facts: z.record(z.unknown()),
  sections: z.array(z.enum(SECTION_IDS)).min(1).optional(),
  qualityThreshold: z.number().min(0).max(1).optional(),
  maxIterations: z.number().int().min(0).max(10).optional(),
});

export interface RunRequest {
  facts: FactModel;
  unavailable: FactKey[];
  sectionIds: SectionId[];
  overrides: GenerationConfigOverrides;
}

export type RunRequestParseResult =
  | { ok: true; request: RunRequest }
  | { ok: false; status: 400 | 422; errors: string[] };

/**
 * body を検証する。形が不正なら 400、使える事実が 1 つも無ければ 422。
 * sections 省略時は全セクションを生成する。
 */
export function parseRunRequest(body: unknown): RunRequestParseResult {
  const parsed = RunRequestSchema.safeParse(body);
  if (!parsed.success) {
    return {
      ok: false,
      status: 400,
      errors: parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`),
    };
  }

  const source = parseFactModel(parsed.data.facts);
  if (!source.ok) {
    return { ok: false, status: 400, errors: source.errors.map((e) => `facts.${e}`) };
  }
  if (source.unavailable.length === FACT_KEYS.length) {
    return { ok: false, status: 422, errors: ["facts: no usable fact was provided"] };
  }

  const overrides: GenerationConfigOverrides = {};
  if (parsed.data.qualityThreshold !== undefined) overrides.qualityThreshold = parsed.data.qualityThreshold;
  if (parsed.data.maxIterations !== undefined) overrides.maxIterations = parsed.data.maxIterations;

  return {
    ok: true,
    request: {
      facts: source.facts,
      unavailable: source.unavailable,
      sectionIds: parsed.data.sections ?? [...SECTION_IDS],
      overrides,
    },
  };
}
