/**
 * 書き直し用プロンプト。本文中の数値と固有名詞は変えさせない。
 */

import type { TextRequest } from "./llm";
import { buildCorrectionPrompt } from "./selfCorrection";
import type { Issue } from "./types";

const REWRITE_SYSTEM_PROMPT = [
  "あなたは省力化補助金の事業計画書を推敲する編集者です。",
  "数値・金額・社名・設備名は一字一句変えずに残してください。",
  "見出し（【】で囲んだ行）や前置き・説明は出力せず、書き直した本文だけを出力してください。",
  "文体は「である」調で統一してください。",
].join("\n");

export function buildRewritePrompt(label: string, body: string, issues: readonly Issue[]): TextRequest {
  const prompt = [
    `以下は事業計画書の「${label}」部分です。`,
    "",
    "---",
    body,
    "---",
    "",
    buildCorrectionPrompt(issues),
  ].join("\n");
  return { system: REWRITE_SYSTEM_PROMPT, prompt };
}
