import { errorMessage } from "../core/logger.js";
import { ToolOutcome, ToolSpec, failure, success } from "../core/toolRegistry.js";
import { ArrApiError } from "../services/arrClient.js";
import { RadarrClient } from "../services/radarrClient.js";
import { SeasonSelection, SonarrClient } from "../services/sonarrClient.js";
import { QbittorrentClient } from "../services/qbittorrentClient.js";
import { formatCandidates, formatQueue, formatSeasons, formatTorrents } from "./formatters.js";

export type MovieBackend = Pick<RadarrClient, "lookupMovie" | "addMovie" | "queue">;
export type SeriesBackend = Pick<SonarrClient, "lookupSeries" | "addSeries" | "queue">;
export type TorrentBackend = Pick<QbittorrentClient, "torrents">;

export interface MediaBackends {
  radarr: MovieBackend;
  sonarr: SeriesBackend;
  qbittorrent: TorrentBackend;
}

export function createMediaTools(backends: MediaBackends): ToolSpec[] {
  const { radarr, sonarr, qbittorrent } = backends;

  return [
    {
      category: "search",
      definition: {
        name: "search_movie",
        description:
          "Search Radarr for movies matching a title. Returns up to 5 candidates with year and TMDB ID. " +
          "If several candidates match, ask the user which one they mean before downloading.",
        input_schema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Movie title, optionally with the year." },
          },
          required: ["query"],
        },
      },
      run: async (input) => {
        const query = readQuery(input);
        if (!query) {
          return failure("search_movie needs a non-empty 'query' string.");
        }
        return guard("searching for movies", async () => {
          const movies = await radarr.lookupMovie(query);
          if (!movies.length) {
            return failure(`No movie found for '${query}'.`);
          }
          return success(
            formatCandidates(
              "movie",
              "TMDB ID",
              movies.map((movie) => ({ title: movie.title, year: movie.year, id: movie.tmdbId })),
            ),
          );
        });
      },
    },
    {
      category: "download",
      definition: {
        name: "download_movie",
        description: "Add a movie to Radarr by its TMDB ID and start searching for a download.",
        input_schema: {
          type: "object",
          properties: {
            tmdb_id: { type: "integer", description: "TMDB ID from search_movie." },
          },
          required: ["tmdb_id"],
        },
      },
      run: async (input) => {
        const tmdbId = parseIdentifier(input.tmdb_id);
        if (tmdbId === undefined) {
          return failure("download_movie needs an integer 'tmdb_id'.");
        }
        return guard("adding the movie", async () => {
          const [movie] = await radarr.lookupMovie(`tmdb:${tmdbId}`);
          if (!movie) {
            return failure(`No movie found with TMDB ID ${tmdbId}.`);
          }
          try {
            const added = await radarr.addMovie(movie);
            return success(`Added movie '${added.title}' to Radarr and started searching for a download.`);
          } catch (error) {
            if (error instanceof ArrApiError && error.isAlreadyAdded()) {
              return success(`Movie '${movie.title}' already exists in Radarr.`);
            }
            throw error;
          }
        });
      },
    },
    {
      category: "search",
      definition: {
        name: "search_series",
        description:
          "Search Sonarr for TV series matching a title. Returns up to 5 candidates with year and TVDB ID. " +
          "If several candidates match, ask the user which one they mean before downloading.",
        input_schema: {
          type: "object",
          properties: {
            query: { type: "string", description: "Series title." },
          },
          required: ["query"],
        },
      },
      run: async (input) => {
        const query = readQuery(input);
        if (!query) {
          return failure("search_series needs a non-empty 'query' string.");
        }
        return guard("searching for series", async () => {
          const series = await sonarr.lookupSeries(query);
          if (!series.length) {
            return failure(`No series found for '${query}'.`);
          }
          return success(
            formatCandidates(
              "series",
              "TVDB ID",
              series.map((entry) => ({ title: entry.title, year: entry.year, id: entry.tvdbId })),
            ),
          );
        });
      },
    },
    {
      category: "download",
      definition: {
        name: "download_series",
        description:
          "Add a TV series to Sonarr by its TVDB ID and download the chosen seasons. " +
          "seasons is \"all\" or a list of season numbers; season 0 holds the specials.",
        input_schema: {
          type: "object",
          properties: {
            tvdb_id: { type: "integer", description: "TVDB ID from search_series." },
            seasons: {
              description: "\"all\", or season numbers such as [1, 2].",
              anyOf: [
                { type: "string", enum: ["all"] },
                { type: "array", items: { type: "integer", minimum: 0 } },
              ],
            },
          },
          required: ["tvdb_id", "seasons"],
        },
      },
      run: async (input) => {
        const tvdbId = parseIdentifier(input.tvdb_id);
        if (tvdbId === undefined) {
          return failure("download_series needs an integer 'tvdb_id'.");
        }
        const seasons = parseSeasons(input.seasons);
        if (!seasons) {
          return failure("download_series needs 'seasons' as \"all\" or a list of non-negative season numbers.");
        }
        return guard("adding the series", async () => {
          const [series] = await sonarr.lookupSeries(`tvdb:${tvdbId}`);
          if (!series) {
            return failure(`No series found with TVDB ID ${tvdbId}.`);
          }
          try {
            const added = await sonarr.addSeries(series, seasons);
            return success(
              `Added series '${added.title}' (seasons: ${formatSeasons(seasons)}) to Sonarr and started searching for a download.`,
            );
          } catch (error) {
            if (error instanceof ArrApiError && error.isAlreadyAdded()) {
              return success(`Series '${series.title}' already exists in Sonarr.`);
            }
            throw error;
          }
        });
      },
    },
    {
      category: "status",
      definition: {
        name: "get_radarr_queue",
        description: "Show the top of the Radarr (movie) download queue.",
        input_schema: { type: "object", properties: {} },
      },
      run: () => guard("reading the Radarr queue", async () => success(formatQueue("Radarr", await radarr.queue()))),
    },
    {
      category: "status",
      definition: {
        name: "get_sonarr_queue",
        description: "Show the top of the Sonarr (series) download queue.",
        input_schema: { type: "object", properties: {} },
      },
      run: () => guard("reading the Sonarr queue", async () => success(formatQueue("Sonarr", await sonarr.queue()))),
    },
    {
      category: "status",
      definition: {
        name: "list_torrents",
        description: "List qBittorrent torrents with their state and progress.",
        input_schema: { type: "object", properties: {} },
      },
      run: () => guard("listing torrents", async () => success(formatTorrents(await qbittorrent.torrents()))),
    },
  ];
}

async function guard(action: string, work: () => Promise<ToolOutcome>): Promise<ToolOutcome> {
  try {
    return await work();
  } catch (error) {
    return failure(`Error while ${action}: ${errorMessage(error)}`);
  }
}

function readQuery(input: Record<string, unknown>): string | undefined {
  return typeof input.query === "string" && input.query.trim() ? input.query.trim() : undefined;
}

export function parseIdentifier(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value > 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return parsed > 0 ? parsed : undefined;
  }
  return undefined;
}

/**
 * Accepts "all", a season number, a list of numbers, numeric strings and
 * comma-separated strings. Duplicates collapse; order is ascending.
 */
export function parseSeasons(value: unknown): SeasonSelection | undefined {
  if (typeof value === "string" && value.trim().toLowerCase() === "all") {
    return "all";
  }

  const items = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : [value];
  const seasons = new Set<number>();
  for (const item of items) {
    const season = parseSeasonNumber(item);
    if (season === undefined) {
      return undefined;
    }
    seasons.add(season);
  }
  return seasons.size ? [...seasons].sort((a, b) => a - b) : undefined;
}

function parseSeasonNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}
