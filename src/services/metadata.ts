import { TrackMetadata, YtDlpTrackInfo } from '../types';

export const UNKNOWN_TITLE = 'Unknown Title';
export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';

function asText(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

/**
 * Pick the fields we tag with from a yt-dlp info document, defaulting what is absent
 */
export function extractMetadata(info: YtDlpTrackInfo): TrackMetadata {
  return {
    title: info.title || UNKNOWN_TITLE,
    artist: info.artist || info.uploader || UNKNOWN_ARTIST,
    album: info.album || info.playlist || UNKNOWN_ALBUM,
    trackNumber: asText(info.track_number),
    releaseYear: asText(info.release_year),
    releaseDate: asText(info.release_date),
    genre: asText(info.genre),
  };
}

/**
 * Vorbis-comment keys to stamp, in the order ffmpeg receives them
 */
export function buildTagEntries(metadata: TrackMetadata): Array<[string, string]> {
  const tags: Array<[string, string]> = [];

  if (metadata.artist) tags.push(['artist', metadata.artist]);
  if (metadata.title) tags.push(['title', metadata.title]);
  if (metadata.album) tags.push(['album', metadata.album]);
  if (metadata.trackNumber) tags.push(['track', metadata.trackNumber]);

  const date = metadata.releaseYear || metadata.releaseDate;
  if (date) tags.push(['date', date]);

  if (metadata.genre) tags.push(['genre', metadata.genre]);

  return tags;
}
