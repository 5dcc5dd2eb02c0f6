import { isRecord } from "../core/json.js";
import { logger } from "../core/logger.js";
import { ArrClient, QueueRecord, asArray, asInteger, asText } from "./arrClient.js";

export interface SeriesCandidate {
  title: string;
  year: number | undefined;
  tvdbId: number | undefined;
  raw: Record<string, unknown>;
}

export interface AddedSeries {
  id: number;
  title: string;
}

export type SeasonSelection = "all" | number[];

export class SonarrClient extends ArrClient {
  protected readonly service = "Sonarr";

  async lookupSeries(term: string): Promise<SeriesCandidate[]> {
    const body = await this.request("series/lookup", { query: { term } });
    return asArray(body).map((raw) => ({
      title: asText(raw.title, "N/A"),
      year: asInteger(raw.year),
      tvdbId: asInteger(raw.tvdbId),
      raw,
    }));
  }

  /** Sonarr v3 still has language profiles; v4 dropped the endpoint. */
  async languageProfileId(): Promise<number | undefined> {
    try {
      const body = await this.request("languageprofile");
      const [first] = asArray(body);
      return asInteger(first?.id);
    } catch {
      return undefined;
    }
  }

  /**
   * Adds the series and monitors only the selected seasons, then searches
   * for their missing episodes.
   */
  async addSeries(series: SeriesCandidate, seasons: SeasonSelection): Promise<AddedSeries> {
    const [folder] = await this.rootFolders();
    if (!folder) {
      throw new Error("Sonarr has no root folder configured");
    }
    const [profile] = await this.qualityProfiles();
    if (!profile) {
      throw new Error("Sonarr has no quality profile configured");
    }
    const languageProfileId = await this.languageProfileId();

    const wanted = seasons === "all" ? undefined : new Set(seasons);
    const seasonList = asArray(series.raw.seasons).map((season) => ({
      ...season,
      monitored: wanted === undefined || wanted.has(asInteger(season.seasonNumber) ?? -1),
    }));

    logger.info(`adding series tvdb:${series.tvdbId ?? "?"} to Sonarr`, undefined, {
      seasons: seasons === "all" ? "all" : seasons.join(","),
    });

    const body = await this.request("series", {
      method: "POST",
      body: {
        ...series.raw,
        seasons: seasonList,
        rootFolderPath: folder.path,
        qualityProfileId: profile.id,
        ...(languageProfileId === undefined ? {} : { languageProfileId }),
        monitored: true,
        seasonFolder: true,
        tags: [],
        addOptions: { monitor: "missing", searchForMissingEpisodes: true },
      },
    });

    if (!isRecord(body)) {
      throw new Error("Sonarr accepted the series but returned no record");
    }
    const id = asInteger(body.id);
    if (id === undefined) {
      throw new Error("Sonarr accepted the series but returned no id");
    }
    return { id, title: asText(body.title, series.title) };
  }

  async queue(): Promise<QueueRecord[]> {
    const records = await this.queueRecords();
    return records.map((record) => ({
      title: isRecord(record.series) ? asText(record.series.title, "N/A") : asText(record.title, "N/A"),
      status: asText(record.status, "N/A"),
      timeleft: asText(record.timeleft, "N/A"),
    }));
  }
}
