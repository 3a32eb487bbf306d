/**
 * 事業計画 生成・検証・修正パイプライン — 内部データ構造
 * FactModel（入力事実）→ SectionDraft（本文）→ ValidationResult（検証結果）→ GenerationRun（実行結果）。
 */

import type { GenerationConfig } from "./config";

// ─── Fact Model ─────────────────────────────────────────────

export const INDUSTRY_TAGS = [
  "construction",
  "manufacturing",
  "it",
  "food_service",
  "care_service",
  "retail",
  "general",
] as const;

export type IndustryTag = (typeof INDUSTRY_TAGS)[number];

export interface CompanyProfile {
  name?: string;
  /** ヒアリングシート記載の業種（自由記述） */
  industry?: string;
  prefecture?: string;
  establishedDate?: string;
  businessDescription?: string;
  employeeCount?: number;
  officerCount?: number;
}

export interface NumericAssumptions {
  /** 付加価値額の年成長倍率（例: 1.05） */
  growthRate?: number;
  /** 給与支給総額の年成長倍率（例: 1.025） */
  salaryGrowthRate?: number;
  /** 人件費換算に使う時給（円） */
  hourlyWage?: number;
  workingDaysPerMonth?: number;
  /** 月平均残業時間 */
  overtimeHours?: number;
  /** 対象業務の 1 日あたり作業時間（導入前） */
  currentHours?: number;
  /** 対象業務の 1 日あたり作業時間（導入後の目標） */
  targetHours?: number;
  revenue?: number;
  operatingProfit?: number;
  laborCost?: number;
  depreciation?: number;
  totalInvestment?: number;
  jobOpeningsRatio?: number;
  currentWorkers?: number;
  desiredWorkers?: number;
}

export interface EquipmentProfile {
  name?: string;
  features?: string;
}

export interface LaborProfile {
  shortageTasks?: string;
  recruitmentPeriod?: string;
  applications?: number;
  hired?: number;
}

export interface NarrativeInputs {
  /** なぜ今必要か */
  motivationBackground?: string;
  /** 創出した時間の活用計画 */
  timeUtilizationPlan?: string;
}

export interface ProcessStep {
  name: string;
  /** 導入前の作業内容 */
  before: string;
  /** 導入後の作業内容 */
  after: string;
  beforeMinutes: number;
  afterMinutes: number;
}

/** 1 回の生成実行を通じて不変の入力スナップショット */
export interface FactModel {
  readonly company: Readonly<CompanyProfile>;
  readonly industryTag: IndustryTag;
  readonly numbers: Readonly<NumericAssumptions>;
  readonly equipment: Readonly<EquipmentProfile>;
  readonly labor: Readonly<LaborProfile>;
  readonly narrative: Readonly<NarrativeInputs>;
  readonly processSteps: readonly Readonly<ProcessStep>[];
}

// ─── Section Template ───────────────────────────────────────

export const SECTION_IDS = [
  "current_state",
  "management_issues",
  "motivation",
  "before_after",
  "effects",
  "productivity",
] as const;

export type SectionId = (typeof SECTION_IDS)[number];

/** PREP 法の 4 スロット */
export const SLOT_ROLES = ["assertion", "justification", "illustration", "restatement"] as const;

export type SlotRole = (typeof SLOT_ROLES)[number];

export interface SlotSpec {
  role: SlotRole;
  /** 本文中の見出し【label】 */
  label: string;
  minChars: number;
  maxChars: number;
  /** 参照する fact key（テンプレート保管庫由来のため文字列で持ち、実行時に検査する） */
  facts: readonly string[];
  /** 文字数不足時に補う一文。{company.name} 形式のプレースホルダーを含められる */
  supplement?: string;
}

export interface ProcessTemplate {
  industryTag: IndustryTag;
  steps: readonly Readonly<ProcessStep>[];
}

export interface SectionTemplate {
  id: SectionId;
  title: string;
  slots: readonly SlotSpec[];
  processTemplate: ProcessTemplate;
}

// ─── Draft / Issue / ValidationResult ───────────────────────

export interface SectionDraft {
  sectionId: SectionId;
  text: string;
  /** 修正回数（0 = 初回生成） */
  iteration: number;
  facts: FactModel;
  frozen: boolean;
}

export const ISSUE_CATEGORIES = [
  "GenericPhrase",
  "Repetition",
  "StructuralDrift",
  "UnnaturalPattern",
  "LengthViolation",
  /** 補助金の基本要件（成長率・工程の記入）。文書全体の検証でのみ出す */
  "RequirementViolation",
] as const;

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number];

export type IssueSeverity = "low" | "medium" | "high";

export interface IssueLocation {
  /** 文書全体の検証でのみ設定 */
  sectionId?: SectionId;
  slot?: SlotRole;
  /** 検証対象テキスト上の文字オフセット [start, end) */
  start: number;
  end: number;
}

export interface Issue {
  category: IssueCategory;
  severity: IssueSeverity;
  location: IssueLocation;
  description: string;
  /** 発火したカタログ項目（語句・パターン・文頭） */
  rule?: string;
}

export interface ValidationResult {
  /** [0, 1] */
  score: number;
  issues: Issue[];
}

// ─── Generation Run ─────────────────────────────────────────

export interface AttemptRecord {
  iteration: number;
  score: number;
  issueCount: number;
}

export interface SectionFailure {
  name: string;
  code: string;
  message: string;
  field?: string;
}

export type SectionOutcome =
  | {
      status: "accepted";
      sectionId: SectionId;
      draft: SectionDraft;
      result: ValidationResult;
      iterations: number;
      attempts: AttemptRecord[];
    }
  | {
      status: "exhausted";
      sectionId: SectionId;
      /** 全イテレーション中で最高スコアの下書き */
      draft: SectionDraft;
      result: ValidationResult;
      iterations: number;
      attempts: AttemptRecord[];
    }
  | {
      status: "failed";
      sectionId: SectionId;
      error: SectionFailure;
      iterations: number;
      attempts: AttemptRecord[];
    };

export interface GenerationRun {
  id: string;
  facts: FactModel;
  /** この実行で使った凍結済み設定 */
  config: GenerationConfig;
  sections: SectionOutcome[];
  /** 全セクション終了後の文書全体検証 */
  documentResult: ValidationResult;
  /** 文書全体でのみ検出された指摘（自動修正しない） */
  residualIssues: Issue[];
}
