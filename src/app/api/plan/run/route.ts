/**
 * POST /api/plan/run
 *
 * ヒアリングデータから事業計画書の各セクションを生成・検証・修正する。
 * OPENAI_API_KEY があれば不自然な表現の書き直しにバックエンドを使う。
 *
 * Body: { facts, sections?, qualityThreshold?, maxIterations? }
 * Response: { ok, run, unavailable } / { ok: false, errors }
 */

import { NextRequest, NextResponse } from "next/server";
import {
  backendFromEnv,
  createServerLogContext,
  loadGenerationConfig,
  parseRunRequest,
  run,
} from "@/lib/planQuality";

export async function POST(req: NextRequest) {
  try {
    const body = await req.json().catch(() => null);
    const parsed = parseRunRequest(body);
    if (!parsed.ok) {
      return NextResponse.json({ ok: false, errors: parsed.errors }, { status: parsed.status });
    }

    const { facts, unavailable, sectionIds, overrides } = parsed.request;
    const result = await run(facts, sectionIds, {
      config: loadGenerationConfig(overrides),
      backend: backendFromEnv(),
      signal: req.signal,
      log: createServerLogContext(),
    });

    return NextResponse.json({
      ok: result.sections.every((s) => s.status !== "failed"),
      run: result,
      unavailable,
    });
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    console.error("[plan/run] error", message);
    return NextResponse.json({ ok: false, errors: [message] }, { status: 500 });
  }
}
