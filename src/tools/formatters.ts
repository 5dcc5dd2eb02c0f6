import { QueueRecord } from "../services/arrClient.js";
import { TorrentSummary } from "../services/qbittorrentClient.js";

export const END_OF_RESULTS = "--- End of search results ---";
export const SEARCH_LIMIT = 5;
export const QUEUE_LIMIT = 5;
export const TORRENT_LIMIT = 10;

export interface Candidate {
  title: string;
  year: number | undefined;
  id: number | undefined;
}

/** Numbered candidate list in backend order, closed by the end marker. */
export function formatCandidates(kind: "movie" | "series", idLabel: string, candidates: Candidate[]): string {
  const shown = candidates.slice(0, SEARCH_LIMIT);
  const label = kind === "movie" ? "Movie" : "Series";
  const noun = kind === "movie" ? "movie(s)" : "series";
  const lines = shown.map(
    (candidate, index) =>
      `${index + 1}. ${label}: ${candidate.title}, Year: ${candidate.year ?? "N/A"}, ${idLabel}: ${candidate.id ?? "N/A"}`,
  );
  return [`Found ${shown.length} ${noun}:`, ...lines, END_OF_RESULTS].join("\n");
}

export function formatQueue(service: "Radarr" | "Sonarr", records: QueueRecord[]): string {
  if (!records.length) {
    return `The ${service} download queue is empty.`;
  }
  const label = service === "Radarr" ? "Movie" : "Series";
  const lines = records
    .slice(0, QUEUE_LIMIT)
    .map((record) => `${label}: ${record.title}, Status: ${record.status}, Time left: ${record.timeleft}`);
  return [`Current ${service} download queue:`, ...lines].join("\n");
}

export function formatTorrents(torrents: TorrentSummary[]): string {
  if (!torrents.length) {
    return "There are no active torrents.";
  }
  const lines = torrents
    .slice(0, TORRENT_LIMIT)
    .map((torrent) => `Torrent: ${torrent.name}, State: ${torrent.state}, Progress: ${(torrent.progress * 100).toFixed(2)}%`);
  return ["Current torrents:", ...lines].join("\n");
}

export function formatSeasons(seasons: "all" | number[]): string {
  return seasons === "all" ? "all" : seasons.join(", ");
}
