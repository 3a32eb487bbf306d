import { describe, it, expect } from "vitest";
import { MissingFactError, TemplateMismatchError } from "./errors";
import { parseFactModel } from "./facts";
import { SAMPLE_HEARING, SAMPLE_HEARING_WITHOUT_WAGE, SIMPLE_TEMPLATE } from "./samples";
import { parseSlots } from "./slots";
import { fillPlaceholders, synthesize, synthesizeSlot } from "./synthesizer";
import { builtInTemplateStore } from "./templates";
import { SECTION_IDS, type FactModel, type SectionId } from "./types";

function factsFrom(input: unknown): FactModel {
  const r = parseFactModel(input);
  if (!r.ok) throw new Error(r.errors.join(", "));
  return r.facts;
}

const FACTS = factsFrom(SAMPLE_HEARING);

function bodyOf(sectionId: SectionId, label: string): string | undefined {
  const template = builtInTemplateStore.getTemplate(sectionId, FACTS.industryTag);
  const draft = synthesize(FACTS, template);
  return parseSlots(draft.text).slots.find((s) => s.label === label)?.body;
}

describe("synthesize", () => {
  it("全セクションでテンプレートの 4 スロットを順に出力する", () => {
    for (const id of SECTION_IDS) {
      const draft = synthesize(FACTS, builtInTemplateStore.getTemplate(id, FACTS.industryTag));
      expect(draft.sectionId).toBe(id);
      expect(draft.iteration).toBe(0);
      expect(parseSlots(draft.text).slots.map((s) => s.label)).toEqual(["結論", "理由", "具体例", "まとめ"]);
    }
  });

  it("成長倍率 1.15 と時給 1,200 円をそのまま引用する", () => {
    expect(bodyOf("productivity", "結論")).toBe(
      "付加価値額を毎年1.15倍（年率15%）のペースで伸ばすことを目標とする。"
    );
    expect(bodyOf("effects", "具体例")).toBe(
      "時給1,200円で換算すると、年間約1,152,000円相当の人件費を削減できる計算である。"
    );
  });

  it("任意の事実があれば文を足す", () => {
    expect(bodyOf("current_state", "結論")).toBe(
      "株式会社サンプル工務店は、静岡県を拠点に建設業を営む事業者である。" +
        "主な事業内容は戸建住宅の新築とリフォーム工事である。" +
        "1998年4月の創業以来、地域の顧客から継続して受注を得ている。"
    );
  });

  it("ビフォーアフターは業種別の工程を使って合計する", () => {
    expect(bodyOf("before_after", "まとめ")).toBe(
      "工程全体では、1件あたりの作業時間が480分から245分となり、49%の削減となる。"
    );
    expect(bodyOf("before_after", "具体例")?.split("\n")[2]).toBe(
      "「数量拾い出し」工程は、手作業計算で90分かかっていたが、導入後はAI自動計算により10分で完了する。"
    );
  });

  it("同じ入力には同じ本文を返す", () => {
    const template = builtInTemplateStore.getTemplate("motivation", FACTS.industryTag);
    expect(synthesize(FACTS, template).text).toBe(synthesize(FACTS, template).text);
  });

  it("必須の事実が無ければ、そのキーを示す MissingFactError", () => {
    const facts = factsFrom(SAMPLE_HEARING_WITHOUT_WAGE);
    const template = builtInTemplateStore.getTemplate("effects", facts.industryTag);
    expect(() => synthesize(facts, template)).toThrow(MissingFactError);
    expect(() => synthesize(facts, template)).toThrow("fact 'numbers.hourlyWage' is required by section 'effects'");
  });

  it("スキーマに無い fact を参照するテンプレートは TemplateMismatchError", () => {
    const template = {
      ...SIMPLE_TEMPLATE,
      slots: [{ ...SIMPLE_TEMPLATE.slots[0], facts: ["company.nickname"] }, ...SIMPLE_TEMPLATE.slots.slice(1)],
    };
    expect(() => synthesize(FACTS, template)).toThrow(TemplateMismatchError);
  });

  it("synthesizeSlot は指定スロットの本文だけを返す", () => {
    expect(synthesizeSlot(FACTS, SIMPLE_TEMPLATE, "restatement")).toBe(
      "削減率は66.7%であり、この時間を新たな受注への対応や技能の継承に充てる。"
    );
  });
});

describe("fillPlaceholders", () => {
  it("fact key を値で埋め、数値は桁区切りにする", () => {
    expect(fillPlaceholders("{company.name}の時給は{numbers.hourlyWage}円", FACTS)).toBe(
      "株式会社サンプル工務店の時給は1,200円"
    );
  });

  it("参照先が無ければ null", () => {
    expect(fillPlaceholders("{narrative.timeUtilizationPlan}", FACTS)).toBeNull();
    expect(fillPlaceholders("{company.nickname}", FACTS)).toBeNull();
  });
});

describe("見出しに見える行を含む事実", () => {
  it("事業内容の中の【結論】は見出しとして読まれない", () => {
    const facts = factsFrom({
      ...SAMPLE_HEARING,
      company: { ...SAMPLE_HEARING.company, businessDescription: "戸建住宅の新築\n【結論】\nリフォーム工事" },
    });
    const draft = synthesize(facts, builtInTemplateStore.getTemplate("current_state", facts.industryTag));
    expect(parseSlots(draft.text).slots.map((s) => s.label)).toEqual(["結論", "理由", "具体例", "まとめ"]);
  });
});
