/**
 * Defect Detector: セクション本文を固定順のチェック（構造 → 文字数 → 定型句 → 不自然表現 → 重複）で検査し、
 * 指摘一覧と減点方式のスコアを返す。副作用なし・同じ入力には同じ結果。
 */

import type { GenerationConfig } from "./config";
import { formatPercent, growthPercent } from "./financials";
import { countChars, parseSlots, splitSentences, type ParsedSlot, type Sentence } from "./slots";
import { SECTION_TEMPLATES } from "./templates";
import {
  SECTION_IDS,
  type FactModel,
  type Issue,
  type IssueCategory,
  type IssueSeverity,
  type SectionId,
  type SectionTemplate,
  type SlotRole,
  type ValidationResult,
} from "./types";

const SEVERITY: Record<IssueCategory, IssueSeverity> = {
  StructuralDrift: "high",
  LengthViolation: "medium",
  Repetition: "medium",
  GenericPhrase: "low",
  UnnaturalPattern: "low",
  RequirementViolation: "high",
};

function issue(
  category: IssueCategory,
  start: number,
  end: number,
  description: string,
  extra: { slot?: SlotRole; sectionId?: SectionId; rule?: string } = {}
): Issue {
  const location = {
    start,
    end,
    ...(extra.slot ? { slot: extra.slot } : {}),
    ...(extra.sectionId ? { sectionId: extra.sectionId } : {}),
  };
  return {
    category,
    severity: SEVERITY[category],
    location,
    description,
    ...(extra.rule ? { rule: extra.rule } : {}),
  };
}

/** 1 − Σ(指摘ごとのカテゴリ重み) を [0, 1] に丸め、小数第 4 位までにする */
export function scoreIssues(issues: readonly Issue[], config: GenerationConfig): number {
  const penalty = issues.reduce((sum, i) => sum + config.penaltyWeights[i.category], 0);
  const clamped = Math.min(1, Math.max(0, 1 - penalty));
  return Math.round(clamped * 10000) / 10000;
}

interface ResolvedSlot extends ParsedSlot {
  role: SlotRole;
}

// ─── 構造 ───────────────────────────────────────────────────

function checkStructure(text: string, template: SectionTemplate): { issues: Issue[]; resolved: ResolvedSlot[] } {
  const parsed = parseSlots(text);
  const issues: Issue[] = [];
  const resolved: ResolvedSlot[] = [];

  if (parsed.preamble) {
    issues.push(
      issue("StructuralDrift", parsed.preamble.start, parsed.preamble.end, "見出しの外に本文がある", { rule: "preamble" })
    );
  }

  const present = new Set(parsed.slots.map((s) => s.label));
  for (const spec of template.slots) {
    if (!present.has(spec.label)) {
      issues.push(
        issue("StructuralDrift", text.length, text.length, `【${spec.label}】が無い`, { slot: spec.role, rule: "missing" })
      );
    }
  }

  const seen = new Set<string>();
  let lastIndex = -1;
  for (const s of parsed.slots) {
    const index = template.slots.findIndex((spec) => spec.label === s.label);
    if (index < 0) {
      issues.push(issue("StructuralDrift", s.headingStart, s.bodyEnd, `未知の見出し【${s.label}】`, { rule: "unknown" }));
      continue;
    }
    const role = template.slots[index].role;
    if (seen.has(s.label)) {
      issues.push(
        issue("StructuralDrift", s.headingStart, s.bodyEnd, `【${s.label}】が重複している`, { slot: role, rule: "duplicate" })
      );
      continue;
    }
    seen.add(s.label);
    if (index < lastIndex) {
      issues.push(
        issue("StructuralDrift", s.headingStart, s.headingEnd, `【${s.label}】の位置がテンプレートの順序と異なる`, {
          slot: role,
          rule: "order",
        })
      );
    }
    lastIndex = Math.max(lastIndex, index);
    if (!s.body) {
      issues.push(issue("StructuralDrift", s.headingStart, s.headingEnd, `【${s.label}】の本文が空`, { slot: role, rule: "empty" }));
    }
    resolved.push({ ...s, role });
  }

  return { issues, resolved };
}

// ─── 文字数 ─────────────────────────────────────────────────

function checkLength(resolved: readonly ResolvedSlot[], template: SectionTemplate): Issue[] {
  const issues: Issue[] = [];
  for (const s of resolved) {
    if (!s.body) continue;
    const spec = template.slots.find((t) => t.role === s.role);
    if (!spec) continue;
    const n = countChars(s.body);
    if (n < spec.minChars || n > spec.maxChars) {
      const detail = n < spec.minChars ? `${spec.minChars}字未満` : `${spec.maxChars}字超過`;
      issues.push(
        issue("LengthViolation", s.bodyStart, s.bodyEnd, `【${s.label}】が${n}字（${detail}）`, {
          slot: s.role,
          rule: `${spec.minChars}-${spec.maxChars}`,
        })
      );
    }
  }
  return issues;
}

// ─── 定型句・不自然表現 ─────────────────────────────────────

function checkGenericPhrases(resolved: readonly ResolvedSlot[], config: GenerationConfig): Issue[] {
  const issues: Issue[] = [];
  for (const s of resolved) {
    for (const { phrase } of config.genericPhrases) {
      let from = 0;
      for (let at = s.body.indexOf(phrase, from); at >= 0; at = s.body.indexOf(phrase, from)) {
        const start = s.bodyStart + at;
        issues.push(issue("GenericPhrase", start, start + phrase.length, `定型句「${phrase}」`, { slot: s.role, rule: phrase }));
        from = at + phrase.length;
      }
    }
  }
  return issues;
}

function checkUnnaturalPatterns(resolved: readonly ResolvedSlot[], config: GenerationConfig): Issue[] {
  const issues: Issue[] = [];
  for (const s of resolved) {
    for (const { pattern, description } of config.unnaturalPatterns) {
      for (const m of s.body.matchAll(new RegExp(pattern, "g"))) {
        if (!m[0]) continue;
        const start = s.bodyStart + (m.index ?? 0);
        issues.push(issue("UnnaturalPattern", start, start + m[0].length, description, { slot: s.role, rule: pattern }));
      }
    }
  }
  return issues;
}

// ─── 重複 ───────────────────────────────────────────────────

interface LocatedSentence extends Sentence {
  slot?: SlotRole;
  sectionId?: SectionId;
}

/**
 * 同一文の再出現と、文頭（先頭 openingLength 文字）が maxOpenings 回を超えた分を指摘する。
 * sameScope が false の組は同一文とみなさない（文書全体の検証で同じセクション内を除外するため）。
 */
function findRepetition(
  sentences: readonly LocatedSentence[],
  openingLength: number,
  maxOpenings: number,
  sameScope: (a: LocatedSentence, b: LocatedSentence) => boolean
): Issue[] {
  const issues: Issue[] = [];
  const firstSeen = new Map<string, LocatedSentence>();
  const openings = new Map<string, number>();

  for (const s of sentences) {
    const earlier = firstSeen.get(s.text);
    if (earlier && sameScope(earlier, s)) {
      issues.push(
        issue("Repetition", s.start, s.end, `同じ文が繰り返されている「${s.text}」`, {
          slot: s.slot,
          sectionId: s.sectionId,
          rule: "sentence",
        })
      );
      continue;
    }
    if (!earlier) firstSeen.set(s.text, s);

    if (s.text.length < openingLength) continue;
    const opening = s.text.slice(0, openingLength);
    const count = (openings.get(opening) ?? 0) + 1;
    openings.set(opening, count);
    if (count > maxOpenings) {
      issues.push(
        issue("Repetition", s.start, s.start + openingLength, `文頭「${opening}」が${count}回目`, {
          slot: s.slot,
          sectionId: s.sectionId,
          rule: "opening",
        })
      );
    }
  }
  return issues;
}

function checkRepetition(resolved: readonly ResolvedSlot[], config: GenerationConfig): Issue[] {
  const sentences = resolved.flatMap((s) =>
    splitSentences(s.body, s.bodyStart).map((x): LocatedSentence => ({ ...x, slot: s.role }))
  );
  const { openingLength, maxOpeningsPerSection } = config.repetition;
  return findRepetition(sentences, openingLength, maxOpeningsPerSection, () => true);
}

/**
 * セクション本文を検証する。
 */
export function validate(text: string, template: SectionTemplate, config: GenerationConfig): ValidationResult {
  const { issues: structural, resolved } = checkStructure(text, template);
  const issues = [
    ...structural,
    ...checkLength(resolved, template),
    ...checkGenericPhrases(resolved, config),
    ...checkUnnaturalPatterns(resolved, config),
    ...checkRepetition(resolved, config),
  ];
  return { score: scoreIssues(issues, config), issues };
}

export interface SectionText {
  sectionId: SectionId;
  text: string;
}

// ─── 文書全体 ───────────────────────────────────────────────

function bodyChars(text: string): number {
  return parseSlots(text).slots.reduce((sum, s) => sum + countChars(s.body), 0);
}

/** セクションごとの最低文字数と、全セクションそろった文書の合計文字数 */
function checkDocumentLength(sections: readonly SectionText[], config: GenerationConfig): Issue[] {
  const issues: Issue[] = [];
  let total = 0;
  for (const { sectionId, text } of sections) {
    const n = bodyChars(text);
    total += n;
    const min = config.sectionMinChars[sectionId];
    if (n < min) {
      issues.push(
        issue("LengthViolation", 0, text.length, `「${SECTION_TEMPLATES[sectionId].title}」が${n}字（${min}字未満）`, {
          sectionId,
          rule: `min-${min}`,
        })
      );
    }
  }
  const covered = new Set(sections.map((s) => s.sectionId));
  if (SECTION_IDS.every((id) => covered.has(id)) && total < config.minTotalChars) {
    issues.push(
      issue("LengthViolation", 0, 0, `文書全体が${total}字（${config.minTotalChars}字未満）`, {
        rule: `min-${config.minTotalChars}`,
      })
    );
  }
  return issues;
}

function growthIssue(rate: number | undefined, min: number, label: string, rule: string): Issue[] {
  if (rate !== undefined && growthPercent(rate) >= min) return [];
  const actual = rate === undefined ? "未入力" : formatPercent(growthPercent(rate));
  return [
    issue("RequirementViolation", 0, 0, `${label}の年成長率が${actual}（基準${formatPercent(min)}以上）`, {
      sectionId: "productivity",
      rule,
    }),
  ];
}

/**
 * 補助金の基本要件: 付加価値額と給与支給総額の年成長率、Before/After 工程の記入。
 */
export function checkRequirements(facts: FactModel, config: GenerationConfig): Issue[] {
  const { minAddedValueGrowthPercent, minSalaryGrowthPercent } = config.requirements;
  const steps = facts.processSteps;
  const filled = steps.some((s) => s.before.trim()) && steps.some((s) => s.after.trim());
  return [
    ...growthIssue(facts.numbers.growthRate, minAddedValueGrowthPercent, "付加価値額", "addedValueGrowth"),
    ...growthIssue(facts.numbers.salaryGrowthRate, minSalaryGrowthPercent, "給与支給総額", "salaryGrowth"),
    ...(filled
      ? []
      : [
          issue("RequirementViolation", 0, 0, "Before/After の工程が記入されていない", {
            sectionId: "before_after",
            rule: "processSteps",
          }),
        ]),
  ];
}

/**
 * 文書全体の検証。セクションをまたぐ同一文と、文書全体で多すぎる文頭を指摘する。
 * 文字数の下限と、facts があれば基本要件も検査する。
 * オフセットは各セクション本文基準で、location.sectionId でセクションを示す。
 */
export function validateDocument(
  sections: readonly SectionText[],
  config: GenerationConfig,
  facts?: FactModel
): ValidationResult {
  const sentences = sections.flatMap(({ sectionId, text }) =>
    parseSlots(text).slots.flatMap((s) =>
      splitSentences(s.body, s.bodyStart).map((x): LocatedSentence => ({ ...x, sectionId }))
    )
  );
  const { openingLength, maxOpeningsPerDocument } = config.repetition;
  const issues = findRepetition(
    sentences,
    openingLength,
    maxOpeningsPerDocument,
    (a, b) => a.sectionId !== b.sectionId
  );
  issues.push(...checkDocumentLength(sections, config));
  if (facts) issues.push(...checkRequirements(facts, config));
  return { score: scoreIssues(issues, config), issues };
}
