import { StoreError } from "@/lib/domain/errors";

export type RedisCommand = Array<string | number>;

export function unwrapPipelineResult(item: unknown): unknown {
  if (item && typeof item === "object") {
    if ("error" in item && typeof item.error === "string" && item.error) {
      throw new StoreError(`Upstash command failed: ${item.error}`);
    }
    if ("result" in item) {
      return item.result;
    }
  }
  return item;
}

export function parseHashPayload(payload: unknown): Record<string, string> {
  if (!payload) {
    return {};
  }
  if (Array.isArray(payload)) {
    const result: Record<string, string> = {};
    for (let i = 0; i < payload.length - 1; i += 2) {
      const field = String(payload[i] ?? "").trim();
      if (!field) continue;
      result[field] = String(payload[i + 1] ?? "");
    }
    return result;
  }
  if (typeof payload === "object") {
    const result: Record<string, string> = {};
    for (const [field, value] of Object.entries(payload)) {
      const normalized = String(field).trim();
      if (!normalized) continue;
      result[normalized] = String(value ?? "");
    }
    return result;
  }
  return {};
}

export class UpstashClient {
  constructor(
    private readonly restUrl: string,
    private readonly restToken: string,
    private readonly timeoutMs = 10_000,
  ) {}

  private async call(path: string, body?: unknown): Promise<unknown> {
    const url = `${this.restUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const response = await fetch(url, {
        method: body === undefined ? "GET" : "POST",
        headers: {
          Authorization: `Bearer ${this.restToken}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      if (!response.ok) {
        throw new StoreError(`Upstash error ${response.status}: ${text}`);
      }
      if (!text.trim()) {
        return null;
      }
      return JSON.parse(text);
    } catch (error) {
      if (error instanceof StoreError) throw error;
      throw new StoreError(`Upstash request failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  async pipeline(commands: RedisCommand[]): Promise<unknown[]> {
    if (!commands.length) {
      return [];
    }
    const payload = await this.call("/pipeline", commands);
    if (!Array.isArray(payload)) {
      throw new StoreError("Upstash pipeline result must be an array");
    }
    return payload.map((item) => unwrapPipelineResult(item));
  }

  /** Runs the commands as one MULTI/EXEC transaction. */
  async multiExec(commands: RedisCommand[]): Promise<unknown[]> {
    if (!commands.length) {
      return [];
    }
    const payload = await this.call("/multi-exec", commands);
    if (!Array.isArray(payload)) {
      throw new StoreError("Upstash transaction result must be an array");
    }
    return payload.map((item) => unwrapPipelineResult(item));
  }

  async command(command: RedisCommand): Promise<unknown> {
    const responses = await this.pipeline([command]);
    return responses[0];
  }

  async ping(): Promise<void> {
    const result = await this.command(["PING"]);
    if (String(result).toUpperCase() !== "PONG") {
      throw new StoreError(`Unexpected PING reply: ${String(result)}`);
    }
  }

  async hget(key: string, field: string): Promise<string | null> {
    const result = await this.command(["HGET", key, field]);
    if (result === null || result === undefined) return null;
    return String(result);
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    return parseHashPayload(await this.command(["HGETALL", key]));
  }

  async smembers(key: string): Promise<string[]> {
    const payload = await this.command(["SMEMBERS", key]);
    if (!Array.isArray(payload)) {
      return [];
    }
    return payload.map((item) => String(item)).filter((item) => item.trim());
  }
}

export function resolveRedisRestUrl(env: NodeJS.ProcessEnv = process.env): string {
  return String(env.UPSTASH_REDIS_REST_URL || env.KV_REST_API_URL || "").trim();
}

export function resolveRedisRestToken(env: NodeJS.ProcessEnv = process.env): string {
  return String(env.UPSTASH_REDIS_REST_TOKEN || env.KV_REST_API_TOKEN || "").trim();
}

export function buildUpstashClientOrNone(env: NodeJS.ProcessEnv = process.env): UpstashClient | null {
  const url = resolveRedisRestUrl(env);
  const token = resolveRedisRestToken(env);
  if (!url || !token) {
    return null;
  }
  return new UpstashClient(url.replace(/\/$/, ""), token);
}
