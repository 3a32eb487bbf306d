/**
 * Section Synthesizer: FactModel とセクションテンプレートから初回の下書きを組み立てる。
 * 文面は (sectionId, スロット役割) ごとの composer 参照表で決まり、同じ入力には同じ出力を返す。
 */

import { MissingFactError, TemplateMismatchError } from "./errors";
import { createFactReader, hasFact, isFactKey, isNumberFactKey, readFact, type FactReader } from "./facts";
import {
  addedValue,
  addedValueSeries,
  annualLaborSaving,
  annualSavedHours,
  formatNumber,
  formatPercent,
  formatYen,
  growthPercent,
  reductionRate,
} from "./financials";
import { renderSlots } from "./slots";
import type { FactModel, SectionDraft, SectionId, SectionTemplate, SlotRole } from "./types";

type Composer = (r: FactReader) => string;

const N = formatNumber;
const Y = formatYen;

/** 句点で終わっていなければ補う */
function asSentence(s: string): string {
  const t = s.trim();
  return /[。！？]$/.test(t) ? t : `${t}。`;
}

function joinSentences(...parts: (string | undefined | false)[]): string {
  return parts.filter((p): p is string => typeof p === "string" && p.length > 0).join("");
}

function round2(v: number): number {
  return Math.round(v * 100) / 100;
}

function savedHoursPerDay(r: FactReader): number {
  return round2(Math.max(0, r.num("numbers.currentHours") - r.num("numbers.targetHours")));
}

function stepSentence(step: FactReader["steps"][number]): string {
  if (step.beforeMinutes === step.afterMinutes && step.before === step.after) {
    return `「${step.name}」工程（${step.before}、${N(step.beforeMinutes)}分）は導入後も変わらない。`;
  }
  return `「${step.name}」工程は、${step.before}で${N(step.beforeMinutes)}分かかっていたが、導入後は${step.after}により${N(step.afterMinutes)}分で完了する。`;
}

const COMPOSERS: Record<SectionId, Record<SlotRole, Composer>> = {
  current_state: {
    assertion: (r) => {
      const desc = r.optionalText("company.businessDescription");
      const established = r.optionalText("company.establishedDate");
      return joinSentences(
        `${r.text("company.name")}は、${r.text("company.prefecture")}を拠点に${r.text("company.industry")}を営む事業者である。`,
        desc && `主な事業内容は${desc.replace(/[。．]$/, "")}である。`,
        established && `${established}の創業以来、地域の顧客から継続して受注を得ている。`
      );
    },
    justification: (r) =>
      joinSentences(
        `${r.text("company.industry")}の有効求人倍率は${N(r.num("numbers.jobOpeningsRatio"))}倍と高く、人材の確保が難しい状況が続いている。`,
        `直近${r.text("labor.recruitmentPeriod")}の募集では応募が${N(r.num("labor.applications"))}名、採用は${N(r.num("labor.hired"))}名にとどまった。`
      ),
    illustration: (r) => {
      const revenue = r.num("numbers.revenue");
      const employees = r.num("company.employeeCount");
      return joinSentences(
        `直近期の売上高は${Y(revenue)}、営業利益は${Y(r.num("numbers.operatingProfit"))}であり、従業員${N(employees)}名で事業を運営している。`,
        employees > 0 && `1人あたりの売上高は${Y(Math.floor(revenue / employees))}となる。`
      );
    },
    restatement: (r) =>
      `限られた人員で現在の受注量を維持するには、従業員${N(r.num("company.employeeCount"))}名の負担を減らす仕組みづくりが欠かせない。`,
  },
  management_issues: {
    assertion: (r) => `経営上の最大の課題は、${r.text("labor.shortageTasks")}を担う人手の不足である。`,
    justification: (r) =>
      joinSentences(
        `${r.text("labor.shortageTasks")}には本来${N(r.num("numbers.desiredWorkers"))}名の人員が必要だが、現在は${N(r.num("numbers.currentWorkers"))}名で対応している。`,
        `不足分は既存社員の残業で補っており、月平均の残業時間は${N(r.num("numbers.overtimeHours"))}時間に達している。`
      ),
    illustration: (r) =>
      `対象業務には1日あたり${N(r.num("numbers.currentHours"))}時間を費やしており、他の業務に手が回らない日も多い。`,
    restatement: (r) => {
      const gap = Math.max(0, r.num("numbers.desiredWorkers") - r.num("numbers.currentWorkers"));
      return `${N(gap)}名分の人員不足と月${N(r.num("numbers.overtimeHours"))}時間の残業を解消することが、事業継続の前提条件となる。`;
    },
  },
  motivation: {
    assertion: (r) => `こうした課題を解決するため、${r.text("equipment.name")}を導入する。`,
    justification: (r) => {
      const background = r.optionalText("narrative.motivationBackground");
      return joinSentences(
        `${r.text("labor.shortageTasks")}は手作業に依存しており、人を増やす以外に処理量を増やす手段がなかった。`,
        `設備による自動化で、1日あたりの作業時間を${N(r.num("numbers.currentHours"))}時間から${N(r.num("numbers.targetHours"))}時間へ短縮できる見込みである。`,
        background && asSentence(background)
      );
    },
    illustration: (r) =>
      joinSentences(
        `${r.text("equipment.name")}は、${r.text("equipment.features")}といった機能を備えている。`,
        "これらの機能により、担当者の経験に頼らず一定の品質で作業を進められる。"
      ),
    restatement: (r) => {
      const plan = r.optionalText("narrative.timeUtilizationPlan");
      return joinSentences(
        `導入によって生まれる1日${N(savedHoursPerDay(r))}時間の余力を、付加価値の高い業務に振り向ける。`,
        plan && asSentence(plan)
      );
    },
  },
  before_after: {
    assertion: (r) => `${r.text("equipment.name")}の導入により、各工程の作業時間を短縮する。`,
    justification: (r) =>
      `現状の${r.text("labor.shortageTasks")}は担当者の手作業に頼っており、工程ごとに待ち時間が生じている。`,
    illustration: (r) =>
      r.steps.length > 0
        ? r.steps.map(stepSentence).join("\n")
        : "工程別の作業時間は、導入後に計測して記録する。",
    restatement: (r) => {
      const before = r.steps.reduce((sum, s) => sum + s.beforeMinutes, 0);
      const after = r.steps.reduce((sum, s) => sum + s.afterMinutes, 0);
      return `工程全体では、1件あたりの作業時間が${N(before)}分から${N(after)}分となり、${formatPercent(reductionRate(before, after))}の削減となる。`;
    },
  },
  effects: {
    assertion: (r) => {
      const yearly = round2(
        annualSavedHours(r.num("numbers.currentHours"), r.num("numbers.targetHours"), r.num("numbers.workingDaysPerMonth"))
      );
      return `導入後は対象業務の作業時間が1日${N(savedHoursPerDay(r))}時間減り、年間では${N(yearly)}時間の削減となる。`;
    },
    justification: (r) =>
      `${r.text("equipment.name")}が作業の大部分を自動で処理するため、担当者は確認と例外対応に専念できる。`,
    illustration: (r) => {
      const wage = r.num("numbers.hourlyWage");
      const saving = annualLaborSaving(
        r.num("numbers.currentHours"),
        r.num("numbers.targetHours"),
        r.num("numbers.workingDaysPerMonth"),
        wage
      );
      return `時給${Y(wage)}で換算すると、年間約${Y(saving)}相当の人件費を削減できる計算である。`;
    },
    restatement: (r) => {
      const rate = reductionRate(r.num("numbers.currentHours"), r.num("numbers.targetHours"));
      return `削減率は${formatPercent(rate)}であり、この時間を新たな受注への対応や技能の継承に充てる。`;
    },
  },
  productivity: {
    assertion: (r) => {
      const g = r.num("numbers.growthRate");
      return `付加価値額を毎年${N(g)}倍（年率${formatPercent(growthPercent(g))}）のペースで伸ばすことを目標とする。`;
    },
    justification: (r) => {
      const base = {
        operatingProfit: r.num("numbers.operatingProfit"),
        laborCost: r.num("numbers.laborCost"),
        depreciation: r.num("numbers.depreciation"),
      };
      return `現在の付加価値額は、営業利益${Y(base.operatingProfit)}、人件費${Y(base.laborCost)}、減価償却費${Y(base.depreciation)}の合計${Y(addedValue(base))}である。`;
    },
    illustration: (r) => {
      const base = {
        operatingProfit: r.num("numbers.operatingProfit"),
        laborCost: r.num("numbers.laborCost"),
        depreciation: r.num("numbers.depreciation"),
      };
      const salaryRate = r.num("numbers.salaryGrowthRate");
      const series = addedValueSeries(base, 5, r.num("numbers.growthRate"), salaryRate);
      return joinSentences(
        `計画では3年後に${Y(series[3])}、5年後に${Y(series[5])}の付加価値額に達する見込みである。`,
        `給与支給総額も年${formatPercent(growthPercent(salaryRate))}ずつ引き上げ、従業員へ成果を還元する。`
      );
    },
    restatement: (r) =>
      `総額${Y(r.num("numbers.totalInvestment"))}の設備投資を、人手不足の解消と生産性の向上に確実につなげる。`,
  },
};

/**
 * テンプレートが参照する fact key を検査する。
 * スキーマに無いキーは TemplateMismatchError、値が無ければ MissingFactError。
 */
export function assertTemplateFacts(facts: FactModel, template: SectionTemplate): void {
  const keys = template.slots.flatMap((s) => s.facts);
  for (const key of keys) {
    if (!isFactKey(key)) throw new TemplateMismatchError(template.id, key);
  }
  for (const key of keys) {
    if (isFactKey(key) && !hasFact(facts, key)) throw new MissingFactError(key, template.id);
  }
}

/**
 * {company.name} 形式のプレースホルダーを事実で埋める。参照先が無ければ null。
 */
export function fillPlaceholders(text: string, facts: FactModel): string | null {
  let missing = false;
  const filled = text.replace(/\{([a-zA-Z]+\.[a-zA-Z]+)\}/g, (whole, key: string) => {
    if (!isFactKey(key) || !hasFact(facts, key)) {
      missing = true;
      return whole;
    }
    const v = readFact(facts, key);
    return isNumberFactKey(key) && typeof v === "number" ? formatNumber(v) : String(v);
  });
  return missing ? null : filled;
}

/** スロット 1 つ分の本文を組み立て直す（Repair Engine から使う） */
export function synthesizeSlot(facts: FactModel, template: SectionTemplate, role: SlotRole): string {
  const reader = createFactReader(facts, template.processTemplate.steps, template.id);
  return COMPOSERS[template.id][role](reader);
}

export function synthesize(facts: FactModel, template: SectionTemplate): SectionDraft {
  assertTemplateFacts(facts, template);
  const reader = createFactReader(facts, template.processTemplate.steps, template.id);
  const slots = template.slots.map((s) => ({ label: s.label, body: COMPOSERS[template.id][s.role](reader) }));
  return { sectionId: template.id, text: renderSlots(slots), iteration: 0, facts, frozen: false };
}
