/**
 * セクション本文のスロット表記。各スロットは見出し行【label】と本文からなり、空行で区切る。
 * Detector はテキストだけからスロットを復元するため、オフセットは常に元テキスト基準で持つ。
 */

export interface ParsedSlot {
  label: string;
  /** 見出し【label】の位置 */
  headingStart: number;
  headingEnd: number;
  /** 前後の空白を除いた本文の位置（空本文なら bodyStart === bodyEnd） */
  bodyStart: number;
  bodyEnd: number;
  body: string;
}

export interface ParsedSection {
  /** 最初の見出しより前にある本文（無ければ null） */
  preamble: { start: number; end: number; text: string } | null;
  slots: ParsedSlot[];
}

export interface SlotText {
  label: string;
  body: string;
}

export interface Sentence {
  text: string;
  start: number;
  end: number;
}

const HEADING = /^【([^】\n]+)】[ \t]*$/gm;

function trimRange(text: string, start: number, end: number): [number, number] {
  let s = start;
  let e = end;
  while (s < e && /\s/.test(text.charAt(s))) s++;
  while (e > s && /\s/.test(text.charAt(e - 1))) e--;
  return [s, e];
}

export function parseSlots(text: string): ParsedSection {
  const headings = [...text.matchAll(HEADING)].map((m) => ({
    label: m[1] ?? "",
    start: m.index ?? 0,
    end: (m.index ?? 0) + m[0].length,
  }));

  const firstHeading = headings.length > 0 ? headings[0].start : text.length;
  const [ps, pe] = trimRange(text, 0, firstHeading);
  const preamble = pe > ps ? { start: ps, end: pe, text: text.slice(ps, pe) } : null;

  const slots = headings.map((h, i) => {
    const next = i + 1 < headings.length ? headings[i + 1].start : text.length;
    const [bs, be] = trimRange(text, h.end, next);
    const empty = be <= bs;
    return {
      label: h.label,
      headingStart: h.start,
      headingEnd: h.end,
      bodyStart: empty ? h.end : bs,
      bodyEnd: empty ? h.end : be,
      body: empty ? "" : text.slice(bs, be),
    };
  });

  return { preamble, slots };
}

export function renderSlots(slots: readonly SlotText[]): string {
  return slots.map((s) => `【${s.label}】\n${s.body}`).join("\n\n");
}

/** 本文に見出し行が含まれるか（リライト結果の検査用） */
export function containsHeading(body: string): boolean {
  return /^【[^】\n]+】[ \t]*$/m.test(body);
}

/**
 * 文単位に分割する。「。」「！」「？」の直後と改行で区切り、offset を足した位置を返す。
 */
export function splitSentences(body: string, offset = 0): Sentence[] {
  const out: Sentence[] = [];
  let start = 0;
  const push = (end: number) => {
    const [s, e] = trimRange(body, start, end);
    if (e > s) out.push({ text: body.slice(s, e), start: offset + s, end: offset + e });
  };
  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch === "\n") {
      push(i);
      start = i + 1;
    } else if (ch === "。" || ch === "！" || ch === "？") {
      push(i + 1);
      start = i + 1;
    }
  }
  push(body.length);
  return out;
}

/** 空白を除いた文字数 */
export function countChars(body: string): number {
  return body.replace(/\s/g, "").length;
}
