import { AppConfig } from "./config.js";
import { ServiceProbe } from "./app.js";
import { ConductorService } from "./core/conductorService.js";
import { SessionStore } from "./core/sessionStore.js";
import { ToolRegistry } from "./core/toolRegistry.js";
import { buildProvider } from "./providers/index.js";
import { QbittorrentClient } from "./services/qbittorrentClient.js";
import { RadarrClient } from "./services/radarrClient.js";
import { SonarrClient } from "./services/sonarrClient.js";
import { createMediaTools } from "./tools/mediaTools.js";

export interface Runtime {
  conductor: ConductorService;
  services: ServiceProbe[];
}

/** Wires provider, downstream clients, tools and session store from config. */
export function createRuntime(config: AppConfig): Runtime {
  const radarr = new RadarrClient(config.services.radarr);
  const sonarr = new SonarrClient(config.services.sonarr);
  const qbittorrent = new QbittorrentClient(config.services.qbittorrent);

  const tools = new ToolRegistry(createMediaTools({ radarr, sonarr, qbittorrent }));
  const sessions = new SessionStore({
    maxMessages: config.historyMaxMessages,
    keepHead: config.historyKeepHead,
  });

  const conductor = new ConductorService(buildProvider(config.provider), tools, sessions, {
    maxSessions: config.maxSessions,
    maxToolRounds: config.maxToolRounds,
    toolResultPreviewChars: config.toolResultPreviewChars,
  });

  return {
    conductor,
    services: [
      { name: "radarr", check: () => radarr.checkHealth() },
      { name: "sonarr", check: () => sonarr.checkHealth() },
      { name: "qbittorrent", check: () => qbittorrent.checkHealth() },
    ],
  };
}
