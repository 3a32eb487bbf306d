/**
 * 付加価値額・削減効果の計算と、本文に埋め込む数値の表記。
 * 付加価値額 = 営業利益 + 人件費 + 減価償却費
 */

export interface AddedValueBase {
  operatingProfit: number;
  laborCost: number;
  depreciation: number;
}

export function addedValue(base: AddedValueBase): number {
  return base.operatingProfit + base.laborCost + base.depreciation;
}

/**
 * year 年目の付加価値額。営業利益は growthRate、人件費は salaryGrowthRate で伸び、減価償却費は定額。
 * 各項目は小数点以下を切り捨てる（year = 0 が基準年）。
 */
export function yearAddedValue(
  base: AddedValueBase,
  year: number,
  growthRate: number,
  salaryGrowthRate: number
): number {
  const op = Math.trunc(base.operatingProfit * growthRate ** year);
  const lc = Math.trunc(base.laborCost * salaryGrowthRate ** year);
  return op + lc + Math.trunc(base.depreciation);
}

/** 基準年から years 年目までの付加価値額 */
export function addedValueSeries(
  base: AddedValueBase,
  years: number,
  growthRate: number,
  salaryGrowthRate: number
): number[] {
  return Array.from({ length: years + 1 }, (_, y) => yearAddedValue(base, y, growthRate, salaryGrowthRate));
}

/** 1.05 → 5（%） */
export function growthPercent(rate: number): number {
  return Math.round((rate - 1) * 1000) / 10;
}

/** 作業時間の削減率（%）。導入前が 0 以下なら 0 */
export function reductionRate(before: number, after: number): number {
  if (before <= 0) return 0;
  return Math.round(((before - after) / before) * 1000) / 10;
}

/** 1 日あたりの削減時間を年間に換算する */
export function annualSavedHours(currentHours: number, targetHours: number, workingDaysPerMonth: number): number {
  return Math.max(0, currentHours - targetHours) * workingDaysPerMonth * 12;
}

/** 年間削減時間を時給で換算した人件費相当額（円未満切り捨て） */
export function annualLaborSaving(
  currentHours: number,
  targetHours: number,
  workingDaysPerMonth: number,
  hourlyWage: number
): number {
  return Math.floor(annualSavedHours(currentHours, targetHours, workingDaysPerMonth) * hourlyWage);
}

// ─── 表記 ───────────────────────────────────────────────────

const integerFormat = new Intl.NumberFormat("ja-JP", { maximumFractionDigits: 0 });
const percentFormat = new Intl.NumberFormat("ja-JP", { maximumFractionDigits: 1 });

/** 1200 → "1,200"、1.15 → "1.15"（小数部は丸めずそのまま） */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return integerFormat.format(value);
  const s = String(value);
  const dot = s.indexOf(".");
  if (dot < 0) return s;
  return integerFormat.format(Math.trunc(value)) + s.slice(dot);
}

export function formatYen(value: number): string {
  return `${formatNumber(value)}円`;
}

/** 小数第 1 位まで */
export function formatPercent(value: number): string {
  return `${percentFormat.format(value)}%`;
}
