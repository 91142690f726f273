import { AppError, ErrorType } from '../utils/error-handler';

/** Picture type "Cover (front)" */
export const FRONT_COVER = 3;

export interface PictureBlock {
  type: number;
  mimeType: string;
  description: string;
  width: number;
  height: number;
  /** Bits per pixel */
  depth: number;
  /** Palette size, 0 for non-indexed images */
  colors: number;
  data: Buffer;
}

/**
 * Serialize a FLAC METADATA_BLOCK_PICTURE body (all integers big-endian u32)
 */
export function buildPictureBlock(picture: PictureBlock): Buffer {
  const mime = Buffer.from(picture.mimeType, 'ascii');
  const description = Buffer.from(picture.description, 'utf8');

  const header = Buffer.alloc(8);
  header.writeUInt32BE(picture.type, 0);
  header.writeUInt32BE(mime.length, 4);

  const descriptionLength = Buffer.alloc(4);
  descriptionLength.writeUInt32BE(description.length, 0);

  const dimensions = Buffer.alloc(20);
  dimensions.writeUInt32BE(picture.width, 0);
  dimensions.writeUInt32BE(picture.height, 4);
  dimensions.writeUInt32BE(picture.depth, 8);
  dimensions.writeUInt32BE(picture.colors, 12);
  dimensions.writeUInt32BE(picture.data.length, 16);

  return Buffer.concat([header, mime, descriptionLength, description, dimensions, picture.data]);
}

export function parsePictureBlock(block: Buffer): PictureBlock {
  let offset = 0;
  const readU32 = (): number => {
    if (offset + 4 > block.length) {
      throw new AppError(ErrorType.MalformedOutput, 'Picture block is truncated', { operation: 'parsePictureBlock' });
    }
    const value = block.readUInt32BE(offset);
    offset += 4;
    return value;
  };
  const readBytes = (length: number): Buffer => {
    if (offset + length > block.length) {
      throw new AppError(ErrorType.MalformedOutput, 'Picture block is truncated', { operation: 'parsePictureBlock' });
    }
    const bytes = block.subarray(offset, offset + length);
    offset += length;
    return bytes;
  };

  const type = readU32();
  const mimeType = readBytes(readU32()).toString('ascii');
  const description = readBytes(readU32()).toString('utf8');
  const width = readU32();
  const height = readU32();
  const depth = readU32();
  const colors = readU32();
  const data = Buffer.from(readBytes(readU32()));

  return { type, mimeType, description, width, height, depth, colors, data };
}

/**
 * Value of the METADATA_BLOCK_PICTURE comment
 */
export function encodePictureComment(picture: PictureBlock): string {
  return buildPictureBlock(picture).toString('base64');
}
