import { z } from "zod";
import type { EngineConfig } from "../config.js";

export type LlmSettings = EngineConfig["llm"];

export type ChatMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

const ChatResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullish() }).optional() })).optional(),
});

export type ChatResult = { ok: true; content: string } | { ok: false; error: string };

function extractJsonCandidate(text: string): string | null {
  const trimmed = text.trim();
  if (!trimmed) return null;
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) return trimmed;
  const firstObj = trimmed.indexOf("{");
  const firstArr = trimmed.indexOf("[");
  const first = firstObj === -1 ? firstArr : firstArr === -1 ? firstObj : Math.min(firstObj, firstArr);
  if (first === -1) return null;
  const lastObj = trimmed.lastIndexOf("}");
  const lastArr = trimmed.lastIndexOf("]");
  const last = Math.max(lastObj, lastArr);
  if (last === -1 || last <= first) return null;
  return trimmed.slice(first, last + 1);
}

/** Pulls the first JSON value out of free-form model output, or null. */
export function tryParseJson(text: string): unknown {
  const candidate = extractJsonCandidate(text);
  if (!candidate) return null;
  try {
    return JSON.parse(candidate);
  } catch {
    return null;
  }
}

/** OpenAI-compatible chat completion (OpenRouter by default). Never throws. */
export async function chatComplete(
  settings: LlmSettings,
  model: string,
  messages: ChatMessage[],
  signal?: AbortSignal
): Promise<ChatResult> {
  if (!settings.chatUrl) return { ok: false, error: "LLM chat URL not configured" };
  if (!settings.apiKey) return { ok: false, error: "LLM API key not configured" };
  try {
    const res = await fetch(settings.chatUrl, {
      method: "POST",
      signal,
      headers: {
        "content-type": "application/json",
        Authorization: `Bearer ${settings.apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages,
        temperature: settings.temperature,
        max_tokens: settings.maxTokens,
      }),
    });
    if (!res.ok) return { ok: false, error: `HTTP ${res.status} ${await res.text()}` };
    const parsed = ChatResponseSchema.safeParse(await res.json());
    if (!parsed.success) return { ok: false, error: "Unexpected LLM response shape" };
    const content = parsed.data.choices?.[0]?.message?.content;
    if (!content) return { ok: false, error: "Empty LLM response" };
    return { ok: true, content };
  } catch (e) {
    return { ok: false, error: String(e) };
  }
}
