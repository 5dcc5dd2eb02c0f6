import { ProviderConfig, ProviderName } from "./providers/index.js";

export interface ServiceConfig {
  radarr: { host: string; apiKey: string };
  sonarr: { host: string; apiKey: string };
  qbittorrent: { host: string; username: string; password: string };
}

export interface AppConfig {
  port: number;
  provider: ProviderConfig;
  services: ServiceConfig;
  historyMaxMessages: number;
  historyKeepHead: number;
  maxSessions: number;
  sessionSweepIntervalMs: number;
  maxToolRounds: number;
  toolResultPreviewChars: number;
  sessionRateLimitPerMin: number;
  maxEventBytes: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const historyMaxMessages = parseInteger(env.HISTORY_MAX_MESSAGES, 50);

  return {
    port: parseInteger(env.PORT, 8000),
    provider: {
      modelProvider: parseProviderName(env.MODEL_PROVIDER),
      ollamaHost: env.OLLAMA_HOST ?? "http://localhost:11434",
      ollamaModel: env.OLLAMA_MODEL ?? "qwen2.5:7b",
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      anthropicModel: env.ANTHROPIC_MODEL ?? "claude-haiku-4-5",
      anthropicMaxTokens: parseInteger(env.ANTHROPIC_MAX_TOKENS, 1024),
      bedrockModelId: env.BEDROCK_MODEL_ID ?? "amazon.nova-lite-v1:0",
      awsRegion: env.AWS_REGION ?? "us-east-1",
    },
    services: {
      radarr: { host: env.RADARR_HOST ?? "http://localhost:7878", apiKey: env.RADARR_API_KEY ?? "" },
      sonarr: { host: env.SONARR_HOST ?? "http://localhost:8989", apiKey: env.SONARR_API_KEY ?? "" },
      qbittorrent: {
        host: env.QBITTORRENT_HOST ?? "http://localhost:8080",
        username: env.QBITTORRENT_USERNAME ?? "admin",
        password: env.QBITTORRENT_PASSWORD ?? "",
      },
    },
    historyMaxMessages,
    historyKeepHead: Math.min(parseInteger(env.HISTORY_KEEP_HEAD, 10), historyMaxMessages),
    maxSessions: parseInteger(env.MAX_SESSIONS, 100),
    sessionSweepIntervalMs: parseInteger(env.SESSION_SWEEP_INTERVAL_MS, 60_000),
    maxToolRounds: parseInteger(env.MAX_TOOL_ROUNDS, 5),
    toolResultPreviewChars: parseInteger(env.TOOL_RESULT_PREVIEW_CHARS, 800),
    sessionRateLimitPerMin: parseInteger(env.SESSION_RATE_LIMIT_PER_MIN, 30),
    maxEventBytes: parseInteger(env.MAX_EVENT_BYTES, 65_536),
  };
}

export function parseProviderName(raw: string | undefined): ProviderName {
  switch ((raw ?? "ollama").trim().toLowerCase()) {
    case "anthropic":
      return "anthropic";
    case "bedrock":
      return "bedrock";
    default:
      return "ollama";
  }
}

export function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value <= 0) {
    return fallback;
  }
  return value;
}
