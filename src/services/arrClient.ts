import { isRecord } from "../core/json.js";

const REQUEST_TIMEOUT_MS = 10_000;

export class ArrApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(service: string, status: number, body: string) {
    super(`${service} API error ${status}: ${body.slice(0, 200)}`);
    this.name = "ArrApiError";
    this.status = status;
    this.body = body;
  }

  /** Radarr and Sonarr reject a duplicate add with a 400 validation body. */
  isAlreadyAdded(): boolean {
    return this.status === 400 && /already (exists|been added)/i.test(this.body);
  }
}

export interface ArrClientConfig {
  host: string;
  apiKey: string;
}

export interface QualityProfile {
  id: number;
  name: string;
}

export interface RootFolder {
  path: string;
}

export interface QueueRecord {
  title: string;
  status: string;
  timeleft: string;
}

/**
 * Shared v3 REST plumbing for the *arr family. Both services authenticate
 * with an `X-Api-Key` header and answer with JSON.
 */
export abstract class ArrClient {
  protected abstract readonly service: string;

  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(config: ArrClientConfig) {
    this.baseUrl = `${config.host.replace(/\/+$/, "")}/api/v3`;
    this.apiKey = config.apiKey;
  }

  async qualityProfiles(): Promise<QualityProfile[]> {
    const body = await this.request("qualityprofile");
    return asArray(body).flatMap((entry) => {
      const id = asInteger(entry.id);
      return id === undefined ? [] : [{ id, name: asText(entry.name, "") }];
    });
  }

  async rootFolders(): Promise<RootFolder[]> {
    const body = await this.request("rootfolder");
    return asArray(body).flatMap((entry) =>
      typeof entry.path === "string" && entry.path ? [{ path: entry.path }] : [],
    );
  }

  /** True when the service answers its health endpoint. */
  async checkHealth(): Promise<boolean> {
    try {
      await this.request("health");
      return true;
    } catch {
      return false;
    }
  }

  protected async queueRecords(): Promise<Record<string, unknown>[]> {
    const body = await this.request("queue");
    return isRecord(body) ? asArray(body.records) : [];
  }

  protected async request(
    path: string,
    init: { method?: "GET" | "POST"; query?: Record<string, string>; body?: unknown } = {},
  ): Promise<unknown> {
    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url, {
      method: init.method ?? "GET",
      headers: {
        "X-Api-Key": this.apiKey,
        "Content-Type": "application/json",
      },
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new ArrApiError(this.service, response.status, text);
    }
    if (!text) {
      return undefined;
    }
    return JSON.parse(text);
  }
}

export function asArray(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

export function asInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

export function asText(value: unknown, fallback: string): string {
  if (typeof value === "string" && value) {
    return value;
  }
  if (typeof value === "number") {
    return String(value);
  }
  return fallback;
}
