import * as fs from 'fs';
import * as path from 'path';
import { parseFile } from 'music-metadata';
import { CleanupMode, CleanupPlan, CleanupResult, DeletionOutcome, ImageMatch, MediaItem } from '../types';
import { AppError, ErrorHandler, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';

export const AUDIO_EXTENSIONS = ['.opus'];
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.bmp', '.gif', '.webp', '.tiff'];

export function toMediaItem(folder: string, name: string): MediaItem {
  return {
    path: path.join(folder, name),
    name,
    baseName: path.parse(name).name.toLowerCase(),
  };
}

/**
 * Audio and image files directly inside folder, each list sorted by name
 */
export function scanFolder(folder: string): { audioFiles: MediaItem[]; imageFiles: MediaItem[] } {
  if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
    throw new AppError(ErrorType.NotFound, folder, { operation: 'scanFolder' });
  }

  const names = fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
  const withExtension = (extensions: string[]) =>
    names.filter((name) => extensions.includes(path.extname(name).toLowerCase())).map((name) => toMediaItem(folder, name));

  return { audioFiles: withExtension(AUDIO_EXTENSIONS), imageFiles: withExtension(IMAGE_EXTENSIONS) };
}

/**
 * First audio file whose base name contains the image's, or is contained in it
 */
export function findMatchingAudio(image: MediaItem, audioFiles: MediaItem[]): MediaItem | undefined {
  return audioFiles.find((audio) => audio.baseName.includes(image.baseName) || image.baseName.includes(audio.baseName));
}

export interface EmbeddedPictureProbe {
  hasEmbeddedPicture(audioPath: string): Promise<boolean>;
}

type MetadataParser = (
  filePath: string,
  options: { duration: boolean; skipCovers: boolean },
) => Promise<{ common: { picture?: unknown[] } }>;

export class MusicMetadataProbe implements EmbeddedPictureProbe {
  constructor(private parse: MetadataParser = parseFile) {}

  async hasEmbeddedPicture(audioPath: string): Promise<boolean> {
    const metadata = await this.parse(audioPath, { duration: false, skipCovers: false });
    return (metadata.common.picture?.length ?? 0) > 0;
  }
}

export interface PlanOptions {
  /** Only select images whose matched audio already carries a picture */
  verify?: boolean;
}

/**
 * Finds and deletes cover images that are no longer needed beside their audio files
 */
export class ImageCleanup {
  constructor(private probe: EmbeddedPictureProbe = new MusicMetadataProbe()) {}

  async plan(folder: string, mode: CleanupMode, options: PlanOptions = {}): Promise<CleanupPlan> {
    const { audioFiles, imageFiles } = scanFolder(folder);
    const matches: ImageMatch[] = [];
    const unmatched: MediaItem[] = [];

    for (const image of imageFiles) {
      const audio = findMatchingAudio(image, audioFiles);
      if (audio) {
        matches.push({ image, audioBaseName: audio.baseName, audioPath: audio.path });
      } else {
        unmatched.push(image);
      }
    }

    if (options.verify) {
      await this.verifyMatches(matches);
    }

    const selected = matches.filter((match) => !options.verify || match.hasEmbeddedCover === true).map((match) => match.image);
    const toDelete = mode === 'all' ? imageFiles : selected;

    Logger.debug('Cleanup plan ready', {
      folder,
      mode,
      images: imageFiles.length,
      matched: matches.length,
      toDelete: toDelete.length,
    });
    return { mode, audioFiles, imageFiles, matches, unmatched, toDelete };
  }

  private async verifyMatches(matches: ImageMatch[]): Promise<void> {
    const checked = new Map<string, boolean>();
    for (const match of matches) {
      let hasPicture = checked.get(match.audioPath);
      if (hasPicture === undefined) {
        try {
          hasPicture = await this.probe.hasEmbeddedPicture(match.audioPath);
        } catch (error) {
          Logger.warn(`Could not read ${path.basename(match.audioPath)}: ${ErrorHandler.messageOf(error)}`);
          hasPicture = false;
        }
        checked.set(match.audioPath, hasPicture);
      }
      match.hasEmbeddedCover = hasPicture;
    }
  }

  /**
   * Delete each file, continuing past failures
   */
  deleteFiles(folder: string, files: MediaItem[], onDeleted: (outcome: DeletionOutcome) => void = () => undefined): CleanupResult {
    const traceId = Logger.startOperation(`cleanup ${folder}`);
    const outcomes: DeletionOutcome[] = [];

    for (const file of files) {
      let outcome: DeletionOutcome;
      try {
        fs.unlinkSync(file.path);
        outcome = { file: file.name, success: true };
      } catch (error) {
        outcome = { file: file.name, success: false, error: ErrorHandler.messageOf(error) };
        Logger.warn(`Error deleting ${file.name}: ${outcome.error}`);
      }
      outcomes.push(outcome);
      onDeleted(outcome);
    }

    const deleted = outcomes.filter((outcome) => outcome.success).length;
    const errors = outcomes.length - deleted;
    Logger.endOperation(traceId, errors === 0, { deleted, errors });

    return { deleted, errors, remaining: fs.readdirSync(folder).length, outcomes };
  }
}
