/**
 * セクションテンプレート（PREP 法 4 スロット）と業種別 Before/After 工程テンプレート。
 * セクション種別は閉じた集合で、sectionId → テンプレートの明示的な参照表で引く。
 */

import { z } from "zod";
import processTemplateData from "./data/processTemplates.json";
import {
  INDUSTRY_TAGS,
  type IndustryTag,
  type ProcessStep,
  type ProcessTemplate,
  type SectionId,
  type SectionTemplate,
  type SlotSpec,
} from "./types";

// ─── 工程テンプレート ───────────────────────────────────────

const ProcessStepSchema = z.object({
  name: z.string().min(1),
  before: z.string(),
  after: z.string(),
  beforeMinutes: z.number().nonnegative(),
  afterMinutes: z.number().nonnegative(),
});

const ProcessTemplateFileSchema = z.object({
  industryKeywords: z.array(
    z.object({ industryTag: z.enum(INDUSTRY_TAGS), keywords: z.array(z.string().min(1)) })
  ),
  templates: z.record(z.enum(INDUSTRY_TAGS), z.array(ProcessStepSchema).min(1)),
});

const processFile = ProcessTemplateFileSchema.parse(processTemplateData);

/**
 * 自由記述の業種名から業種タグを決める。キーワード表の先頭から一致を探し、無ければ general。
 */
export function resolveIndustryTag(industry: string): IndustryTag {
  for (const { industryTag, keywords } of processFile.industryKeywords) {
    if (keywords.some((k) => industry.includes(k))) return industryTag;
  }
  return "general";
}

export function processTemplateFor(industryTag: IndustryTag): ProcessTemplate {
  const steps: ProcessStep[] | undefined = processFile.templates[industryTag] ?? processFile.templates.general;
  return { industryTag, steps: (steps ?? []).map((s) => Object.freeze({ ...s })) };
}

// ─── セクションテンプレート ─────────────────────────────────

function slot(
  role: SlotSpec["role"],
  label: string,
  facts: string[],
  band: [number, number],
  supplement?: string
): SlotSpec {
  return { role, label, minChars: band[0], maxChars: band[1], facts, supplement };
}

type SectionTemplateDefinition = Omit<SectionTemplate, "processTemplate">;

export const SECTION_TEMPLATES: Record<SectionId, SectionTemplateDefinition> = {
  current_state: {
    id: "current_state",
    title: "1-1 現状分析",
    slots: [
      slot("assertion", "結論", ["company.name", "company.industry", "company.prefecture"], [20, 300]),
      slot(
        "justification",
        "理由",
        ["company.industry", "numbers.jobOpeningsRatio", "labor.recruitmentPeriod", "labor.applications", "labor.hired"],
        [30, 400],
        "{company.prefecture}の同業他社も採用に苦戦しており、状況が短期間で好転する見込みは薄い。"
      ),
      slot("illustration", "具体例", ["numbers.revenue", "numbers.operatingProfit", "company.employeeCount"], [30, 400]),
      slot("restatement", "まとめ", ["company.employeeCount"], [20, 300]),
    ],
  },
  management_issues: {
    id: "management_issues",
    title: "1-2 経営上の課題",
    slots: [
      slot("assertion", "結論", ["labor.shortageTasks"], [20, 300]),
      slot(
        "justification",
        "理由",
        ["labor.shortageTasks", "numbers.currentWorkers", "numbers.desiredWorkers", "numbers.overtimeHours"],
        [30, 400]
      ),
      slot(
        "illustration",
        "具体例",
        ["numbers.currentHours"],
        [20, 400],
        "ベテラン社員の退職が続けば、{labor.shortageTasks}の品質を保てなくなる恐れがある。"
      ),
      slot("restatement", "まとめ", ["numbers.currentWorkers", "numbers.desiredWorkers", "numbers.overtimeHours"], [20, 300]),
    ],
  },
  motivation: {
    id: "motivation",
    title: "1-3 動機・目的",
    slots: [
      slot("assertion", "結論", ["equipment.name"], [15, 300]),
      slot("justification", "理由", ["labor.shortageTasks", "numbers.currentHours", "numbers.targetHours"], [30, 400]),
      slot("illustration", "具体例", ["equipment.name", "equipment.features"], [20, 400]),
      slot("restatement", "まとめ", ["numbers.currentHours", "numbers.targetHours"], [20, 300]),
    ],
  },
  before_after: {
    id: "before_after",
    title: "2-1 ビフォーアフター",
    slots: [
      slot("assertion", "結論", ["equipment.name"], [20, 300]),
      slot(
        "justification",
        "理由",
        ["labor.shortageTasks"],
        [20, 400],
        "作業手順が担当者ごとに異なるため、引き継ぎのたびに確認作業が発生している。"
      ),
      slot("illustration", "具体例", [], [40, 1200]),
      slot("restatement", "まとめ", [], [20, 300]),
    ],
  },
  effects: {
    id: "effects",
    title: "2-2 効果",
    slots: [
      slot("assertion", "結論", ["numbers.currentHours", "numbers.targetHours", "numbers.workingDaysPerMonth"], [20, 300]),
      slot("justification", "理由", ["equipment.name"], [20, 400]),
      slot(
        "illustration",
        "具体例",
        ["numbers.hourlyWage", "numbers.currentHours", "numbers.targetHours", "numbers.workingDaysPerMonth"],
        [20, 400],
        "残業の削減により、割増賃金の支出も抑えられる。"
      ),
      slot("restatement", "まとめ", ["numbers.currentHours", "numbers.targetHours", "numbers.workingDaysPerMonth"], [20, 300]),
    ],
  },
  productivity: {
    id: "productivity",
    title: "3-1 生産性向上",
    slots: [
      slot("assertion", "結論", ["numbers.growthRate"], [20, 300]),
      slot("justification", "理由", ["numbers.operatingProfit", "numbers.laborCost", "numbers.depreciation"], [30, 400]),
      slot(
        "illustration",
        "具体例",
        ["numbers.operatingProfit", "numbers.laborCost", "numbers.depreciation", "numbers.growthRate", "numbers.salaryGrowthRate"],
        [30, 400]
      ),
      slot("restatement", "まとめ", ["numbers.totalInvestment"], [15, 300]),
    ],
  },
};

/** テンプレート保管庫。1 回の実行中は不変として扱う */
export interface TemplateStore {
  getTemplate(sectionId: SectionId, industryTag: IndustryTag): SectionTemplate;
}

export const builtInTemplateStore: TemplateStore = {
  getTemplate(sectionId, industryTag) {
    return { ...SECTION_TEMPLATES[sectionId], processTemplate: processTemplateFor(industryTag) };
  },
};
