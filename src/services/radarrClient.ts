import { isRecord } from "../core/json.js";
import { logger } from "../core/logger.js";
import { ArrClient, QueueRecord, asArray, asInteger, asText } from "./arrClient.js";

export interface MovieCandidate {
  title: string;
  year: number | undefined;
  tmdbId: number | undefined;
  /** The lookup record as returned, resent on add. */
  raw: Record<string, unknown>;
}

export interface AddedMovie {
  id: number;
  title: string;
}

export class RadarrClient extends ArrClient {
  protected readonly service = "Radarr";

  async lookupMovie(term: string): Promise<MovieCandidate[]> {
    const body = await this.request("movie/lookup", { query: { term } });
    return asArray(body).map((raw) => ({
      title: asText(raw.title, "N/A"),
      year: asInteger(raw.year),
      tmdbId: asInteger(raw.tmdbId),
      raw,
    }));
  }

  /**
   * Adds a looked-up movie with the first root folder and quality profile
   * and asks Radarr to start searching for it.
   */
  async addMovie(movie: MovieCandidate): Promise<AddedMovie> {
    const [folder] = await this.rootFolders();
    if (!folder) {
      throw new Error("Radarr has no root folder configured");
    }
    const [profile] = await this.qualityProfiles();
    if (!profile) {
      throw new Error("Radarr has no quality profile configured");
    }

    logger.info(`adding movie tmdb:${movie.tmdbId ?? "?"} to Radarr`);
    const body = await this.request("movie", {
      method: "POST",
      body: {
        title: movie.raw.title,
        tmdbId: movie.raw.tmdbId,
        year: movie.raw.year,
        titleSlug: movie.raw.titleSlug,
        images: movie.raw.images,
        qualityProfileId: profile.id,
        rootFolderPath: folder.path,
        monitored: true,
        addOptions: { monitor: "movieOnly", searchForMovie: true },
      },
    });

    const id = isRecord(body) ? asInteger(body.id) : undefined;
    if (!isRecord(body) || id === undefined) {
      throw new Error("Radarr accepted the movie but returned no id");
    }
    return { id, title: asText(body.title, movie.title) };
  }

  async queue(): Promise<QueueRecord[]> {
    const records = await this.queueRecords();
    return records.map((record) => ({
      title: asText(record.title, "N/A"),
      status: asText(record.status, "N/A"),
      timeleft: asText(record.timeleft, "N/A"),
    }));
  }
}
