import { isRecord } from "@/lib/infra/json";

export class LlmError extends Error {}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

function extractJsonPayload(raw: string): string {
  let text = String(raw || "").trim();
  if (text.startsWith("```")) {
    text = text.replace(/^```(?:json)?\s*/i, "").replace(/\s*```$/, "").trim();
  }
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start > 0 && end > start) {
    text = text.slice(start, end + 1);
  }
  return text;
}

/** Client for an OpenAI-compatible chat/embeddings API. */
export class LlmClient {
  readonly apiKey: string;

  readonly model: string;

  readonly embeddingModel: string;

  readonly baseUrl: string;

  readonly timeoutMs: number;

  constructor(
    options: { apiKey?: string; model?: string; embeddingModel?: string; baseUrl?: string; timeoutSeconds?: number } = {},
  ) {
    this.apiKey = options.apiKey || process.env.LLM_API_KEY || process.env.OPENAI_API_KEY || "";
    this.model = options.model || process.env.LLM_MODEL || "gpt-4o-mini";
    this.embeddingModel = options.embeddingModel || process.env.EMBEDDING_MODEL || "text-embedding-3-small";
    this.baseUrl = (options.baseUrl || process.env.LLM_BASE_URL || "https://api.openai.com/v1").replace(/\/$/, "");
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 60) * 1_000));

    if (!this.apiKey) {
      throw new LlmError("Missing LLM_API_KEY");
    }
  }

  private async post(path: string, payload: Record<string, unknown>): Promise<Record<string, unknown>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });

      const text = await response.text();
      if (!response.ok) {
        throw new LlmError(`LLM request failed: ${response.status} ${text}`);
      }

      let data: unknown;
      try {
        data = JSON.parse(text);
      } catch {
        throw new LlmError(`Unexpected LLM response: ${text}`);
      }
      if (!isRecord(data)) {
        throw new LlmError(`Unexpected LLM response: ${text}`);
      }
      return data;
    } finally {
      clearTimeout(timer);
    }
  }

  async chat(messages: ChatMessage[], temperature = 0.2): Promise<string> {
    const data = await this.post("/chat/completions", {
      model: this.model,
      messages,
      temperature,
      response_format: { type: "json_object" },
    });

    const choices = Array.isArray(data.choices) ? data.choices : [];
    const first: unknown = choices[0];
    const message = isRecord(first) ? first.message : undefined;
    const content = isRecord(message) ? message.content : undefined;
    if (typeof content !== "string") {
      throw new LlmError(`Unexpected LLM response: ${JSON.stringify(data).slice(0, 500)}`);
    }
    return content;
  }

  async chatJson(messages: ChatMessage[], temperature = 0.2): Promise<Record<string, unknown>> {
    const raw = await this.chat(messages, temperature);
    const cleaned = extractJsonPayload(raw);
    let parsed: unknown;
    try {
      parsed = JSON.parse(cleaned);
    } catch {
      throw new LlmError(`Model output is not valid JSON: ${raw}`);
    }
    if (!isRecord(parsed)) {
      throw new LlmError(`Model output is not a JSON object: ${raw}`);
    }
    return parsed;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];
    const data = await this.post("/embeddings", {
      model: this.embeddingModel,
      input: texts,
    });

    const rows = Array.isArray(data.data) ? data.data : [];
    const vectors = rows.map((row: unknown) => {
      const embedding = isRecord(row) ? row.embedding : undefined;
      if (!Array.isArray(embedding)) {
        throw new LlmError("Embedding response is missing vectors");
      }
      return embedding.map((value) => Number(value));
    });
    if (vectors.length !== texts.length) {
      throw new LlmError(`Expected ${texts.length} embeddings, got ${vectors.length}`);
    }
    return vectors;
  }
}
