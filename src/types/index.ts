/**
 * A file considered by the image cleanup matcher
 */
export interface MediaItem {
  path: string;
  name: string;
  /** Lowercase name without extension */
  baseName: string;
}

export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  trackNumber: string;
  releaseYear: string;
  releaseDate: string;
  genre: string;
}

export interface FailedDownloadRecord {
  url: string;
  title: string;
  artist: string;
  error: string;
  timestamp: string;
  /** Directory the track was headed for; kept in memory only */
  destination?: string;
}

/**
 * Subset of the yt-dlp --dump-json document we read
 */
export interface YtDlpTrackInfo {
  id?: string;
  title?: string | null;
  artist?: string | null;
  uploader?: string | null;
  album?: string | null;
  playlist?: string | null;
  track_number?: number | string | null;
  release_year?: number | string | null;
  release_date?: string | null;
  genre?: string | null;
}

export interface YtDlpPlaylistEntry {
  id?: string | null;
  title?: string | null;
  url?: string | null;
}

export interface YtDlpPlaylist {
  title?: string | null;
  entries?: Array<YtDlpPlaylistEntry | null>;
}

export type StrategyResult = { success: true } | { success: false; reason: string };

export interface TrackDownloadResult {
  success: boolean;
  message: string;
  filePath?: string;
}

export interface PlaylistResult {
  title: string;
  total: number;
  successful: number;
  failed: number;
  skipped: number;
}

export type UrlKind = 'playlist' | 'album' | 'track';

export interface EmbedBatchResult {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
}

export type CleanupMode = 'all' | 'matched' | 'dry-run';

export interface ImageMatch {
  image: MediaItem;
  /** Base name of the first matching audio file */
  audioBaseName: string;
  audioPath: string;
  /** Set when verification was requested */
  hasEmbeddedCover?: boolean;
}

export interface CleanupPlan {
  mode: CleanupMode;
  audioFiles: MediaItem[];
  imageFiles: MediaItem[];
  matches: ImageMatch[];
  unmatched: MediaItem[];
  toDelete: MediaItem[];
}

export interface DeletionOutcome {
  file: string;
  success: boolean;
  error?: string;
}

export interface CleanupResult {
  deleted: number;
  errors: number;
  remaining: number;
  outcomes: DeletionOutcome[];
}
