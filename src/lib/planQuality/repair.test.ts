import { describe, it, expect } from "vitest";
import { loadGenerationConfig, type GenerationConfig } from "./config";
import { parseFactModel, type FactInput } from "./facts";
import type { TextBackend, TextRequest } from "./llm";
import { repair } from "./repair";
import { CLEAN_TEXT, REPEATED_OPENING_TEXT, SAMPLE_HEARING, SIMPLE_TEMPLATE, sampleText } from "./samples";
import type { FactModel, SectionDraft, SectionTemplate } from "./types";
import { validate } from "./validator";

const CONFIG = loadGenerationConfig();

function factsOf(raw: FactInput): FactModel {
  const r = parseFactModel(raw);
  if (!r.ok) throw new Error(r.errors.join(", "));
  return r.facts;
}

const FACTS = factsOf(SAMPLE_HEARING);

async function validateAndRepair(
  text: string,
  options: { config?: GenerationConfig; backend?: TextBackend; template?: SectionTemplate; facts?: FactModel } = {}
): Promise<SectionDraft> {
  const config = options.config ?? CONFIG;
  const template = options.template ?? SIMPLE_TEMPLATE;
  const facts = options.facts ?? FACTS;
  const { issues } = validate(text, template, config);
  const draft: SectionDraft = { sectionId: "effects", text, iteration: 0, facts, frozen: false };
  return repair(draft, issues, facts, template, { config, backend: options.backend });
}

function stubBackend(reply: string): TextBackend & { requests: TextRequest[] } {
  const requests: TextRequest[] = [];
  return {
    requests,
    async generate(request) {
      requests.push(request);
      return reply;
    },
  };
}

describe("repair", () => {
  it("iteration を 1 進め、指摘の無い下書きは本文を変えない", async () => {
    const repaired = await validateAndRepair(CLEAN_TEXT);
    expect(repaired.text).toBe(CLEAN_TEXT);
    expect(repaired.iteration).toBe(1);
    expect(repaired.frozen).toBe(false);
  });

  it("定型句を事実で埋めた代替表現に置き換える", async () => {
    const repaired = await validateAndRepair(sampleText({ assertion: "最新の設備で作業時間を1日4時間短縮する。" }));
    expect(repaired.text).toBe(sampleText({ assertion: "AI積算システムで作業時間を1日4時間短縮する。" }));
  });

  it("同じ文の 2 回目を削る", async () => {
    const repaired = await validateAndRepair(
      sampleText({ justification: "積算を自動で処理できるためである。積算を自動で処理できるためである。" })
    );
    expect(repaired.text).toBe(CLEAN_TEXT);
  });

  it("使いすぎた文頭には接続詞を前置する", async () => {
    const repaired = await validateAndRepair(REPEATED_OPENING_TEXT);
    expect(repaired.text).toBe(
      sampleText({ assertion: "導入後は作業時間が減る。導入後は残業も減る。加えて、導入後は品質も安定する。" })
    );
    expect(validate(repaired.text, SIMPLE_TEMPLATE, CONFIG).issues).toEqual([]);
  });

  it("書き換え規則のある不自然な表現は規則どおりに直す", async () => {
    const repaired = await validateAndRepair(sampleText({ justification: "積算を自動で処理することができます。" }));
    expect(repaired.text).toBe(sampleText({ justification: "積算を自動で処理できる。" }));
  });

  it("欠けたスロットだけを作り直す", async () => {
    const text = CLEAN_TEXT.slice(0, CLEAN_TEXT.indexOf("\n\n【まとめ】"));
    const repaired = await validateAndRepair(text);
    expect(repaired.text).toBe(
      sampleText({ restatement: "削減率は66.7%であり、この時間を新たな受注への対応や技能の継承に充てる。" })
    );
  });

  it("見出しの外の本文を捨てる", async () => {
    const repaired = await validateAndRepair(`はじめに書いた文。\n${CLEAN_TEXT}`);
    expect(repaired.text).toBe(CLEAN_TEXT);
  });

  it("長すぎるスロットは数字を含まない文を末尾から削る", async () => {
    const template: SectionTemplate = {
      ...SIMPLE_TEMPLATE,
      slots: SIMPLE_TEMPLATE.slots.map((s) => (s.role === "illustration" ? { ...s, maxChars: 30 } : s)),
    };
    const repaired = await validateAndRepair(
      sampleText({ illustration: "数量拾い出しは90分から10分になる。担当者の負担が軽くなる。確認の手間も減っていく。" }),
      { template }
    );
    expect(repaired.text).toBe(CLEAN_TEXT);
  });

  it("短すぎるスロットは作り直した本文の方が長ければそれを使う", async () => {
    const repaired = await validateAndRepair(sampleText({ illustration: "短い。" }));
    expect(repaired.text).toBe(
      sampleText({ illustration: "時給1,200円で換算すると、年間約1,152,000円相当の人件費を削減できる計算である。" })
    );
  });

  describe("バックエンドによる書き直し", () => {
    const config = loadGenerationConfig({
      unnaturalPatterns: [{ pattern: "重要な役割を果たし", description: "定型的な修辞" }],
    });
    const text = sampleText({ illustration: "数量拾い出しは90分から10分になり、重要な役割を果たす。" });

    it("数値が変わらなければ採用する", async () => {
      const backend = stubBackend("数量拾い出しは90分から10分になる。");
      const repaired = await validateAndRepair(text, { config, backend });
      expect(repaired.text).toBe(CLEAN_TEXT);
      expect(backend.requests).toHaveLength(1);
      expect(backend.requests[0].prompt).toContain("数量拾い出しは90分から10分になり、重要な役割を果たす。");
      expect(backend.requests[0].prompt).toContain("- 定型的な修辞（該当: 重要な役割を果たし）");
    });

    it("数値が変わった書き直しは捨てる", async () => {
      const repaired = await validateAndRepair(text, { config, backend: stubBackend("数量拾い出しは90分から5分になる。") });
      expect(repaired.text).toBe(text);
    });

    it("見出しを含む書き直しは捨てる", async () => {
      const repaired = await validateAndRepair(text, { config, backend: stubBackend("【具体例】\n90分から10分になる。") });
      expect(repaired.text).toBe(text);
    });

    it("事実の値を落とした書き直しは捨てる", async () => {
      const withName = sampleText({ illustration: "AI積算システムで数量拾い出しは90分から10分になり、重要な役割を果たす。" });
      const repaired = await validateAndRepair(withName, {
        config,
        backend: stubBackend("数量拾い出しは90分から10分になる。"),
      });
      expect(repaired.text).toBe(withName);
    });

    it("バックエンドが無ければそのまま残す", async () => {
      const repaired = await validateAndRepair(text, { config });
      expect(repaired.text).toBe(text);
      expect(validate(repaired.text, SIMPLE_TEMPLATE, config).issues.map((i) => i.category)).toEqual([
        "UnnaturalPattern",
      ]);
    });
  });

  describe("事実の値に掛かる指摘", () => {
    it("社名の中の感嘆符は書き換えず、社名の外だけを直す", async () => {
      const facts = factsOf({ ...SAMPLE_HEARING, company: { ...SAMPLE_HEARING.company, name: "株式会社ヤッタ！" } });
      const repaired = await validateAndRepair(
        sampleText({ assertion: "株式会社ヤッタ！は作業時間を1日4時間短縮する！" }),
        { facts }
      );
      expect(repaired.text).toBe(sampleText({ assertion: "株式会社ヤッタ！は作業時間を1日4時間短縮する。" }));
    });

    it("設備名に含まれる定型句は置き換えず、設備名が伸びない", async () => {
      const facts = factsOf({
        ...SAMPLE_HEARING,
        equipment: { ...SAMPLE_HEARING.equipment, name: "最新の設備管理システム" },
      });
      const text = sampleText({ justification: "最新の設備管理システムが積算を処理し、最新の設備で検査する。" });
      const once = await validateAndRepair(text, { facts });
      const expected = sampleText({
        justification: "最新の設備管理システムが積算を処理し、最新の設備管理システムで検査する。",
      });
      expect(once.text).toBe(expected);

      const twice = await validateAndRepair(once.text, { facts });
      expect(twice.text).toBe(expected);
    });
  });
});
