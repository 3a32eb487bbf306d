import { describe, it, expect } from "vitest";
import { loadGenerationConfig } from "./config";
import { parseFactModel, type FactInput } from "./facts";
import { CLEAN_TEXT, REPEATED_OPENING_TEXT, SAMPLE_HEARING, SIMPLE_TEMPLATE, sampleText } from "./samples";
import { renderSlots } from "./slots";
import { validate, validateDocument } from "./validator";
import { SECTION_IDS, type FactModel } from "./types";

const CONFIG = loadGenerationConfig();

/** セクション単位の最低文字数を外した設定 */
const NO_SECTION_MINIMUMS = loadGenerationConfig({
  sectionMinChars: {
    current_state: 0,
    management_issues: 0,
    motivation: 0,
    before_after: 0,
    effects: 0,
    productivity: 0,
  },
});

function factsOf(raw: FactInput): FactModel {
  const r = parseFactModel(raw);
  if (!r.ok) throw new Error(r.errors.join(", "));
  return r.facts;
}

describe("validate", () => {
  it("指摘が無ければスコア 1", () => {
    const r = validate(CLEAN_TEXT, SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues).toEqual([]);
    expect(r.score).toBe(1);
  });

  it("同じ文頭が 3 回続くと、3 回目を Repetition として減点する", () => {
    const r = validate(REPEATED_OPENING_TEXT, SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues).toEqual([
      {
        category: "Repetition",
        severity: "medium",
        location: { start: 27, end: 31, slot: "assertion" },
        description: "文頭「導入後は」が3回目",
        rule: "opening",
      },
    ]);
    expect(r.score).toBe(0.9);
  });

  it("同じ文の繰り返しは 2 回目を指摘する", () => {
    const text = sampleText({ justification: "積算を自動で処理できるためである。積算を自動で処理できるためである。" });
    const r = validate(text, SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues.map((i) => [i.category, i.rule, i.location.slot])).toEqual([
      ["Repetition", "sentence", "justification"],
    ]);
    expect(r.score).toBe(0.9);
  });

  it("欠けたスロットは StructuralDrift", () => {
    const text = renderSlots([
      { label: "結論", body: "作業時間を1日4時間短縮する。" },
      { label: "理由", body: "積算を自動で処理できるためである。" },
      { label: "具体例", body: "数量拾い出しは90分から10分になる。" },
    ]);
    const r = validate(text, SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues).toEqual([
      {
        category: "StructuralDrift",
        severity: "high",
        location: { start: text.length, end: text.length, slot: "restatement" },
        description: "【まとめ】が無い",
        rule: "missing",
      },
    ]);
    expect(r.score).toBe(0.7);
  });

  it("順序違い・重複・未知の見出し・見出し外の本文・空の本文を区別する", () => {
    const swapped = renderSlots([
      { label: "結論", body: "作業時間を1日4時間短縮する。" },
      { label: "具体例", body: "数量拾い出しは90分から10分になる。" },
      { label: "理由", body: "積算を自動で処理できるためである。" },
      { label: "まとめ", body: "創出した時間を営業活動に充てる。" },
    ]);
    expect(validate(swapped, SIMPLE_TEMPLATE, CONFIG).issues.map((i) => [i.rule, i.location.slot])).toEqual([
      ["order", "justification"],
    ]);

    const duplicated = `${CLEAN_TEXT}\n\n【結論】\n別の結論を書く。`;
    expect(validate(duplicated, SIMPLE_TEMPLATE, CONFIG).issues.map((i) => i.rule)).toEqual(["duplicate"]);

    const unknown = `${CLEAN_TEXT}\n\n【補足】\n補足の本文を書く。`;
    expect(validate(unknown, SIMPLE_TEMPLATE, CONFIG).issues.map((i) => i.rule)).toEqual(["unknown"]);

    const preamble = `はじめに書いた文。\n${CLEAN_TEXT}`;
    expect(validate(preamble, SIMPLE_TEMPLATE, CONFIG).issues.map((i) => [i.rule, i.location])).toEqual([
      ["preamble", { start: 0, end: 9 }],
    ]);

    const empty = sampleText({ illustration: "" });
    expect(validate(empty, SIMPLE_TEMPLATE, CONFIG).issues.map((i) => [i.rule, i.location.slot])).toEqual([
      ["empty", "illustration"],
    ]);
  });

  it("文字数帯から外れたスロットは LengthViolation", () => {
    const r = validate(sampleText({ illustration: "短い。" }), SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues).toHaveLength(1);
    expect(r.issues[0]).toMatchObject({
      category: "LengthViolation",
      severity: "medium",
      location: { slot: "illustration" },
      description: "【具体例】が3字（5字未満）",
      rule: "5-200",
    });
    expect(r.score).toBe(0.9);
  });

  it("定型句は出現位置ごとに指摘する", () => {
    const r = validate(sampleText({ assertion: "最新の設備で作業時間を1日4時間短縮する。" }), SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues).toEqual([
      {
        category: "GenericPhrase",
        severity: "low",
        location: { start: 5, end: 10, slot: "assertion" },
        description: "定型句「最新の設備」",
        rule: "最新の設備",
      },
    ]);
    expect(r.score).toBe(0.95);
  });

  it("不自然な表現と穴あきの残留を指摘する", () => {
    const stiff = validate(sampleText({ justification: "積算を自動で処理することができます。" }), SIMPLE_TEMPLATE, CONFIG);
    expect(stiff.issues.map((i) => [i.category, i.rule])).toEqual([["UnnaturalPattern", "することができます"]]);

    const holes = validate(sampleText({ illustration: "単価は〇〇円で、係数は4.083333である。" }), SIMPLE_TEMPLATE, CONFIG);
    expect(holes.issues.map((i) => i.rule)).toEqual(["\\d+\\.\\d{6,}", "〇〇|●●|△△|□□|※※"]);
    expect(holes.score).toBe(0.9);
  });

  it("チェックは構造 → 文字数 → 定型句 → 不自然表現 → 重複の順に並ぶ", () => {
    const text = renderSlots([
      { label: "結論", body: "最新の設備を入れる。最新の設備を入れる。" },
      { label: "理由", body: "短い！" },
      { label: "具体例", body: "数量拾い出しは90分から10分になる。" },
    ]);
    const r = validate(text, SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues.map((i) => i.category)).toEqual([
      "StructuralDrift",
      "LengthViolation",
      "GenericPhrase",
      "GenericPhrase",
      "UnnaturalPattern",
      "Repetition",
    ]);
  });

  it("同じ入力には同じ結果を返す", () => {
    const a = validate(REPEATED_OPENING_TEXT, SIMPLE_TEMPLATE, CONFIG);
    const b = validate(REPEATED_OPENING_TEXT, SIMPLE_TEMPLATE, CONFIG);
    expect(b).toEqual(a);
  });

  it("スコアは 0 未満にならない", () => {
    const r = validate("", SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues).toHaveLength(4);
    expect(r.score).toBe(0);
  });
});

describe("validateDocument", () => {
  it("セクションをまたぐ同一文を、後のセクションの位置で指摘する", () => {
    const r = validateDocument(
      [
        { sectionId: "effects", text: CLEAN_TEXT },
        { sectionId: "productivity", text: CLEAN_TEXT },
      ],
      NO_SECTION_MINIMUMS
    );
    expect(r.issues).toHaveLength(4);
    expect(r.issues.every((i) => i.category === "Repetition" && i.rule === "sentence")).toBe(true);
    expect(r.issues.every((i) => i.location.sectionId === "productivity")).toBe(true);
    expect(r.issues[0].location).toEqual({ start: 5, end: 20, sectionId: "productivity" });
    expect(r.score).toBe(0.6);
  });

  it("同じセクション内の重複は文書全体の検証では数えない", () => {
    const text = sampleText({ justification: "積算を自動で処理できるためである。積算を自動で処理できるためである。" });
    expect(validateDocument([{ sectionId: "effects", text }], NO_SECTION_MINIMUMS).issues).toEqual([]);
  });

  it("文書全体で maxOpeningsPerDocument を超えた文頭を指摘する", () => {
    const sections = SECTION_IDS.map((sectionId, n) => ({
      sectionId,
      text: sampleText({ restatement: `導入後は${n + 1}件目の改善を進める。` }),
    }));
    const openings = validateDocument(sections, CONFIG).issues.filter((i) => i.rule === "opening");
    expect(openings).toHaveLength(1);
    expect(openings[0].location.sectionId).toBe("productivity");
    expect(openings[0].description).toBe("文頭「導入後は」が6回目");
  });

  it("セクションの本文が最低文字数に届かなければ LengthViolation", () => {
    const r = validateDocument([{ sectionId: "effects", text: CLEAN_TEXT }], CONFIG);
    expect(r.issues).toEqual([
      {
        category: "LengthViolation",
        severity: "medium",
        location: { start: 0, end: CLEAN_TEXT.length, sectionId: "effects" },
        description: "「2-2 効果」が67字（600字未満）",
        rule: "min-600",
      },
    ]);
    expect(r.score).toBe(0.9);
  });

  it("全セクションそろった文書の合計文字数を検査する", () => {
    const all = SECTION_IDS.map((sectionId) => ({ sectionId, text: CLEAN_TEXT }));
    const total = validateDocument(all, NO_SECTION_MINIMUMS).issues.filter((i) => i.rule === "min-4700");
    expect(total).toEqual([
      {
        category: "LengthViolation",
        severity: "medium",
        location: { start: 0, end: 0 },
        description: "文書全体が402字（4700字未満）",
        rule: "min-4700",
      },
    ]);

    const partial = validateDocument(all.slice(1), NO_SECTION_MINIMUMS).issues.filter((i) => i.rule === "min-4700");
    expect(partial).toEqual([]);
  });

  it("基本要件を満たす事実なら要件の指摘は無い", () => {
    expect(validateDocument([], CONFIG, factsOf(SAMPLE_HEARING))).toEqual({ score: 1, issues: [] });
  });

  it("付加価値額の年成長率が 4% 未満なら RequirementViolation", () => {
    const facts = factsOf({ ...SAMPLE_HEARING, numbers: { ...SAMPLE_HEARING.numbers, growthRate: 1.03, salaryGrowthRate: 1.02 } });
    const r = validateDocument([], CONFIG, facts);
    expect(r.issues).toEqual([
      {
        category: "RequirementViolation",
        severity: "high",
        location: { start: 0, end: 0, sectionId: "productivity" },
        description: "付加価値額の年成長率が3%（基準4%以上）",
        rule: "addedValueGrowth",
      },
    ]);
    expect(r.score).toBe(0.7);
  });

  it("給与支給総額の成長率が未入力なら RequirementViolation", () => {
    const facts = factsOf({ ...SAMPLE_HEARING, numbers: { ...SAMPLE_HEARING.numbers, salaryGrowthRate: null } });
    expect(validateDocument([], CONFIG, facts).issues.map((i) => [i.rule, i.description])).toEqual([
      ["salaryGrowth", "給与支給総額の年成長率が未入力（基準2%以上）"],
    ]);
  });

  it("導入前の作業内容が 1 つも無い工程表は RequirementViolation", () => {
    const facts = factsOf({
      ...SAMPLE_HEARING,
      processSteps: [{ name: "検品", before: "", after: "画像検査", beforeMinutes: 30, afterMinutes: 5 }],
    });
    expect(validateDocument([], CONFIG, facts).issues.map((i) => [i.rule, i.location.sectionId])).toEqual([
      ["processSteps", "before_after"],
    ]);
  });
});

describe("金額がすべて 0 円の本文", () => {
  it("0円が 3 つ続くと UnnaturalPattern", () => {
    const text = sampleText({ illustration: "売上高は0円、営業利益は0円、人件費は0円である。" });
    const r = validate(text, SIMPLE_TEMPLATE, CONFIG);
    expect(r.issues.map((i) => i.description)).toEqual(["金額がすべて0円（財務データ未入力）"]);
    expect(text.slice(r.issues[0].location.start, r.issues[0].location.end)).toBe("0円、営業利益は0円、人件費は0円");
  });

  it("桁区切りの末尾の 0円 は数えない", () => {
    const text = sampleText({ illustration: "売上高は150,000,000円、営業利益は8,000,000円、人件費は40,000,000円である。" });
    expect(validate(text, SIMPLE_TEMPLATE, CONFIG).issues).toEqual([]);
  });
});
