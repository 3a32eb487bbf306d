/**
 * テストデータ: ヒアリングシート相当の入力と、検証・修正テスト用の本文。
 */

import type { FactInput } from "./facts";
import { renderSlots } from "./slots";
import type { SectionTemplate } from "./types";

/** 建設業の小規模事業者。全 fact key のうち narrative 以外を埋めてある */
export const SAMPLE_HEARING: FactInput = {
  company: {
    name: "株式会社サンプル工務店",
    industry: "建設業",
    prefecture: "静岡県",
    establishedDate: "1998年4月",
    businessDescription: "戸建住宅の新築とリフォーム工事",
    employeeCount: 12,
    officerCount: 2,
  },
  numbers: {
    growthRate: 1.15,
    salaryGrowthRate: 1.025,
    hourlyWage: 1200,
    workingDaysPerMonth: 20,
    overtimeHours: 30,
    currentHours: 6,
    targetHours: 2,
    revenue: 150000000,
    operatingProfit: 8000000,
    laborCost: 40000000,
    depreciation: 2000000,
    totalInvestment: 9000000,
    jobOpeningsRatio: 5.2,
    currentWorkers: 3,
    desiredWorkers: 5,
  },
  equipment: {
    name: "AI積算システム",
    features: "図面からの数量自動拾い出しと単価データベースとの自動照合",
  },
  labor: {
    shortageTasks: "見積・積算業務",
    recruitmentPeriod: "1年間",
    applications: 2,
    hired: 0,
  },
};

/** 時給が未入力（effects セクションが MissingFactError になる） */
export const SAMPLE_HEARING_WITHOUT_WAGE: FactInput = {
  ...SAMPLE_HEARING,
  numbers: { ...SAMPLE_HEARING.numbers, hourlyWage: null },
};

/** 文字数帯を広く取った 4 スロットのテンプレート（本文は effects の composer で作る） */
export const SIMPLE_TEMPLATE: SectionTemplate = {
  id: "effects",
  title: "テスト用",
  slots: [
    { role: "assertion", label: "結論", minChars: 5, maxChars: 200, facts: [] },
    { role: "justification", label: "理由", minChars: 5, maxChars: 200, facts: [] },
    { role: "illustration", label: "具体例", minChars: 5, maxChars: 200, facts: [] },
    { role: "restatement", label: "まとめ", minChars: 5, maxChars: 200, facts: [] },
  ],
  processTemplate: { industryTag: "general", steps: [] },
};

export const CLEAN_BODIES = {
  assertion: "作業時間を1日4時間短縮する。",
  justification: "積算を自動で処理できるためである。",
  illustration: "数量拾い出しは90分から10分になる。",
  restatement: "創出した時間を営業活動に充てる。",
};

export function sampleText(bodies: Partial<typeof CLEAN_BODIES> = {}): string {
  const b = { ...CLEAN_BODIES, ...bodies };
  return renderSlots([
    { label: "結論", body: b.assertion },
    { label: "理由", body: b.justification },
    { label: "具体例", body: b.illustration },
    { label: "まとめ", body: b.restatement },
  ]);
}

/** 指摘なしの本文 */
export const CLEAN_TEXT = sampleText();

/** 文頭「導入後は」が 3 回続く */
export const REPEATED_OPENING_TEXT = sampleText({
  assertion: "導入後は作業時間が減る。導入後は残業も減る。導入後は品質も安定する。",
});
