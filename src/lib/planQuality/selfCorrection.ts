/**
 * 自己修正用 — Detector の指摘を書き直し依頼プロンプトに埋め込む。
 */

import type { Issue } from "./types";

/**
 * 指摘一覧から、バックエンドへの書き直し依頼の指示部分を組み立てる。
 * rule（発火した語句・パターン）があれば併記する。
 */
export function buildCorrectionPrompt(issues: readonly Issue[]): string {
  const lines: string[] = [
    "【検証エラー】以下の指摘を解消するように、本文だけを書き直してください。",
    ...issues.map((i) => `- ${i.description}${i.rule ? `（該当: ${i.rule}）` : ""}`),
  ];
  return lines.join("\n");
}
