/**
 * テキスト生成バックエンド（OpenAI 互換の chat completions）。
 * Repair Engine からは TextBackend インターフェース越しにだけ呼ぶ。
 * OPENAI_API_KEY が無ければバックエンド無しで動き、修正は決定的な戦略だけになる。
 */

import { BackendTransientError, PlanGenerationError } from "./errors";

const OPENAI_URL = "https://api.openai.com/v1/chat/completions";
const DEFAULT_MODEL = "gpt-4o-mini";

/** 再試行してよい HTTP ステータス（レート制限と 5xx） */
const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface LlmMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface TextRequest {
  system: string;
  prompt: string;
}

export interface TextBackend {
  generate(request: TextRequest, signal?: AbortSignal): Promise<string>;
}

export interface OpenAiBackendOptions {
  apiKey: string;
  model?: string;
  url?: string;
  temperature?: number;
  fetch?: typeof fetch;
}

/**
 * メッセージを送り、応答テキストを 1 件返す。
 * 429 / 5xx / ネットワーク障害は BackendTransientError、それ以外の失敗は BACKEND_REJECTED。
 */
export async function callLlm(
  messages: LlmMessage[],
  options: OpenAiBackendOptions,
  signal?: AbortSignal
): Promise<string> {
  const doFetch = options.fetch ?? fetch;
  let res: Response;
  try {
    res = await doFetch(options.url ?? OPENAI_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${options.apiKey.trim()}`,
      },
      body: JSON.stringify({
        model: options.model ?? DEFAULT_MODEL,
        messages,
        temperature: options.temperature ?? 0.3,
      }),
      signal,
    });
  } catch (e) {
    if (signal?.aborted) throw e;
    const msg = e instanceof Error ? e.message : String(e);
    throw new BackendTransientError(`OpenAI request failed: ${msg}`);
  }

  if (!res.ok) {
    const text = await res.text();
    const message = `OpenAI API error ${res.status}: ${text.slice(0, 500)}`;
    if (TRANSIENT_STATUSES.has(res.status)) throw new BackendTransientError(message, res.status);
    throw new PlanGenerationError("BACKEND_REJECTED", message);
  }

  const data: unknown = await res.json();
  const content = extractContent(data);
  if (content === null) {
    throw new PlanGenerationError("BACKEND_REJECTED", "OpenAI API returned no content");
  }
  return content.trim();
}

function extractContent(data: unknown): string | null {
  if (!data || typeof data !== "object" || !("choices" in data) || !Array.isArray(data.choices)) return null;
  const first: unknown = data.choices[0];
  if (!first || typeof first !== "object" || !("message" in first)) return null;
  const message: unknown = first.message;
  if (!message || typeof message !== "object" || !("content" in message)) return null;
  return typeof message.content === "string" ? message.content : null;
}

export function createOpenAiBackend(options: OpenAiBackendOptions): TextBackend {
  return {
    generate(request, signal) {
      return callLlm(
        [
          { role: "system", content: request.system },
          { role: "user", content: request.prompt },
        ],
        options,
        signal
      );
    },
  };
}

/**
 * 環境変数からバックエンドを作る。OPENAI_API_KEY が未設定なら undefined。
 */
export function backendFromEnv(env: NodeJS.ProcessEnv = process.env): TextBackend | undefined {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey || !apiKey.trim()) return undefined;
  return createOpenAiBackend({ apiKey, model: env.OPENAI_MODEL?.trim() || undefined });
}
