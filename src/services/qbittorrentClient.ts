import { logger } from "../core/logger.js";
import { asArray, asText } from "./arrClient.js";

const REQUEST_TIMEOUT_MS = 10_000;

export class QbittorrentError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "QbittorrentError";
    this.status = status;
  }
}

export interface QbittorrentConfig {
  host: string;
  username: string;
  password: string;
}

export interface TorrentSummary {
  name: string;
  state: string;
  /** Fraction between 0 and 1. */
  progress: number;
}

/**
 * WebUI API v2 client. Authentication is a cookie session: the SID from
 * `auth/login` is replayed on every request, and a 403 triggers one re-login.
 */
export class QbittorrentClient {
  private readonly baseUrl: string;
  private readonly config: QbittorrentConfig;
  private sid: string | undefined;

  constructor(config: QbittorrentConfig) {
    this.baseUrl = `${config.host.replace(/\/+$/, "")}/api/v2`;
    this.config = config;
  }

  async login(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/auth/login`, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({ username: this.config.username, password: this.config.password }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    const text = await response.text();
    if (!response.ok) {
      throw new QbittorrentError(`qBittorrent login failed with HTTP ${response.status}`, response.status);
    }

    const sid = /SID=([^;]+)/.exec(response.headers.get("set-cookie") ?? "")?.[1];
    if (!sid) {
      throw new QbittorrentError(`qBittorrent login rejected: ${text.trim() || "no session cookie"}`);
    }
    this.sid = sid;
    logger.debug("qBittorrent session established");
  }

  async torrents(filter?: string): Promise<TorrentSummary[]> {
    const text = await this.request("torrents/info", filter ? { filter } : {});
    const body: unknown = text ? JSON.parse(text) : [];
    return asArray(body).map((torrent) => ({
      name: asText(torrent.name, "N/A"),
      state: asText(torrent.state, "N/A"),
      progress: typeof torrent.progress === "number" ? torrent.progress : 0,
    }));
  }

  async version(): Promise<string> {
    return (await this.request("app/version")).trim();
  }

  async checkHealth(): Promise<boolean> {
    try {
      return Boolean(await this.version());
    } catch {
      return false;
    }
  }

  private async request(path: string, query: Record<string, string> = {}, retried = false): Promise<string> {
    if (!this.sid) {
      await this.login();
    }

    const url = new URL(`${this.baseUrl}/${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    const response = await fetch(url, {
      headers: { Cookie: `SID=${this.sid ?? ""}` },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (response.status === 403 && !retried) {
      this.sid = undefined;
      return this.request(path, query, true);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new QbittorrentError(`qBittorrent API error ${response.status}: ${text.slice(0, 200)}`, response.status);
    }
    return text;
  }
}
