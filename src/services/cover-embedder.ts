import * as fs from 'fs';
import * as path from 'path';
import sharp from 'sharp';
import { EmbedBatchResult } from '../types';
import { AppError, ErrorHandler, ErrorType } from '../utils/error-handler';
import { Logger } from '../utils/logger';
import { ProgressCallback, noopProgress } from '../utils/progress';
import { findCoverForSong, mimeTypeForCover } from './cover-finder';
import { FRONT_COVER, encodePictureComment } from './picture-block';
import { setCoverPicture } from './opus-tags';

export interface ImageDimensions {
  width: number;
  height: number;
  /** Bits per pixel */
  depth: number;
}

export interface ImageInspector {
  inspect(imagePath: string): Promise<ImageDimensions>;
}

/**
 * Decodes the image as sRGB without alpha, so depth is 24 for any colour input
 */
export class SharpImageInspector implements ImageInspector {
  async inspect(imagePath: string): Promise<ImageDimensions> {
    const { info } = await sharp(imagePath)
      .removeAlpha()
      .toColourspace('srgb')
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, depth: info.channels * 8 };
  }
}

export interface CoverEvent {
  audioPath: string;
  coverPath?: string;
  status: 'embedded' | 'skipped' | 'failed';
}

/**
 * Embeds front-cover pictures into Opus files
 */
export class CoverEmbedder {
  constructor(private inspector: ImageInspector = new SharpImageInspector()) {}

  /**
   * Embed coverPath into audioPath, replacing earlier pictures. Returns false on
   * failure after logging it.
   */
  async embedCover(audioPath: string, coverPath: string): Promise<boolean> {
    const tempPath = path.join(path.dirname(audioPath), `.${path.basename(audioPath)}.cover.tmp`);
    try {
      const data = fs.readFileSync(coverPath);
      const { width, height, depth } = await this.inspector.inspect(coverPath);

      const comment = encodePictureComment({
        type: FRONT_COVER,
        mimeType: mimeTypeForCover(coverPath),
        description: '',
        width,
        height,
        depth,
        colors: 0,
        data,
      });

      const updated = setCoverPicture(fs.readFileSync(audioPath), comment);
      fs.writeFileSync(tempPath, updated);
      fs.renameSync(tempPath, audioPath);

      Logger.info(`Embedded cover into ${path.basename(audioPath)}`, { cover: path.basename(coverPath) });
      return true;
    } catch (error) {
      const appError = ErrorHandler.parse(error, { operation: 'embedCover', resource: audioPath });
      ErrorHandler.log(appError, 'warn');
      this.removeTemp(tempPath);
      return false;
    }
  }

  private removeTemp(tempPath: string): void {
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch (error) {
      Logger.warn(`Could not remove temporary file ${tempPath}: ${ErrorHandler.messageOf(error)}`);
    }
  }

  /**
   * Embed covers into every .opus file directly inside folder
   */
  async batchProcess(
    folder: string,
    onProgress: ProgressCallback = noopProgress,
    onFile: (event: CoverEvent) => void = () => undefined,
  ): Promise<EmbedBatchResult> {
    if (!fs.existsSync(folder) || !fs.statSync(folder).isDirectory()) {
      throw new AppError(ErrorType.NotFound, folder, { operation: 'batchProcess' });
    }

    const opusFiles = fs
      .readdirSync(folder, { withFileTypes: true })
      .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.opus')
      .map((entry) => path.join(folder, entry.name))
      .sort();

    const result: EmbedBatchResult = { total: opusFiles.length, processed: 0, skipped: 0, failed: 0 };
    if (opusFiles.length === 0) {
      return result;
    }

    const traceId = Logger.startOperation(`embed covers in ${folder}`);
    for (const [index, audioPath] of opusFiles.entries()) {
      onProgress({ stage: 'Embedding covers', current: index + 1, total: opusFiles.length, message: path.basename(audioPath) });

      const coverPath = findCoverForSong(audioPath);
      if (!coverPath) {
        result.skipped++;
        onFile({ audioPath, status: 'skipped' });
        continue;
      }

      if (await this.embedCover(audioPath, coverPath)) {
        result.processed++;
        onFile({ audioPath, coverPath, status: 'embedded' });
      } else {
        result.failed++;
        onFile({ audioPath, coverPath, status: 'failed' });
      }
    }
    Logger.endOperation(traceId, result.failed === 0, { ...result });

    return result;
  }
}
