import { AppError, ErrorType } from '../utils/error-handler';

/**
 * Reading and rewriting the comment header (OpusTags) of an Ogg Opus stream.
 * Audio pages are copied byte for byte; only pages of the Opus stream that follow
 * the header get new sequence numbers and checksums.
 */

const CAPTURE_PATTERN = Buffer.from('OggS', 'ascii');
const OPUS_HEAD = Buffer.from('OpusHead', 'ascii');
const OPUS_TAGS = Buffer.from('OpusTags', 'ascii');
const PAGE_HEADER_SIZE = 27;
const MAX_SEGMENTS_PER_PAGE = 255;
const CONTINUED_PACKET = 0x01;

export const PICTURE_COMMENT_KEY = 'METADATA_BLOCK_PICTURE';
const LEGACY_COVER_KEY = 'COVERART';

export interface OggPage {
  headerType: number;
  granulePosition: bigint;
  serial: number;
  sequence: number;
  /** Lacing values */
  segments: number[];
  body: Buffer;
}

export interface OpusTags {
  vendor: string;
  /** Raw "KEY=value" entries in file order */
  comments: string[];
  /** Bytes after the comment list, kept as they are */
  trailing: Buffer;
}

function malformed(message: string): AppError {
  return new AppError(ErrorType.MalformedOutput, message, { operation: 'opusTags' });
}

const CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let r = i << 24;
    for (let bit = 0; bit < 8; bit++) {
      r = r & 0x80000000 ? (r << 1) ^ 0x04c11db7 : r << 1;
    }
    table[i] = r >>> 0;
  }
  return table;
})();

/**
 * Ogg page checksum: CRC-32, polynomial 0x04c11db7, no reflection, initial value 0
 */
export function oggCrc32(data: Buffer): number {
  let crc = 0;
  for (const byte of data) {
    crc = ((crc << 8) ^ CRC_TABLE[((crc >>> 24) ^ byte) & 0xff]) >>> 0;
  }
  return crc >>> 0;
}

export function parseOggPages(file: Buffer): OggPage[] {
  const pages: OggPage[] = [];
  let offset = 0;

  while (offset < file.length) {
    if (offset + PAGE_HEADER_SIZE > file.length || !file.subarray(offset, offset + 4).equals(CAPTURE_PATTERN)) {
      throw malformed(`No Ogg page at byte ${offset}`);
    }
    const segmentCount = file.readUInt8(offset + 26);
    const tableEnd = offset + PAGE_HEADER_SIZE + segmentCount;
    if (tableEnd > file.length) {
      throw malformed('Ogg page header is truncated');
    }
    const segments = Array.from(file.subarray(offset + PAGE_HEADER_SIZE, tableEnd));
    const bodyLength = segments.reduce((sum, value) => sum + value, 0);
    if (tableEnd + bodyLength > file.length) {
      throw malformed('Ogg page body is truncated');
    }

    pages.push({
      headerType: file.readUInt8(offset + 5),
      granulePosition: file.readBigInt64LE(offset + 6),
      serial: file.readUInt32LE(offset + 14),
      sequence: file.readUInt32LE(offset + 18),
      segments,
      body: file.subarray(tableEnd, tableEnd + bodyLength),
    });
    offset = tableEnd + bodyLength;
  }

  return pages;
}

export function serializeOggPage(page: OggPage): Buffer {
  const header = Buffer.alloc(PAGE_HEADER_SIZE);
  CAPTURE_PATTERN.copy(header, 0);
  header.writeUInt8(0, 4);
  header.writeUInt8(page.headerType, 5);
  header.writeBigInt64LE(page.granulePosition, 6);
  header.writeUInt32LE(page.serial, 14);
  header.writeUInt32LE(page.sequence, 18);
  header.writeUInt32LE(0, 22);
  header.writeUInt8(page.segments.length, 26);

  const bytes = Buffer.concat([header, Buffer.from(page.segments), page.body]);
  bytes.writeUInt32LE(oggCrc32(bytes), 22);
  return bytes;
}

/**
 * Split one packet into header pages (granule 0). The packet starts on the first
 * page; later pages carry the continuation flag.
 */
export function paginatePacket(packet: Buffer, serial: number, firstSequence: number): OggPage[] {
  const lacing: number[] = [];
  let remaining = packet.length;
  while (remaining >= 255) {
    lacing.push(255);
    remaining -= 255;
  }
  lacing.push(remaining);

  const pages: OggPage[] = [];
  let bodyOffset = 0;
  for (let start = 0; start < lacing.length; start += MAX_SEGMENTS_PER_PAGE) {
    const segments = lacing.slice(start, start + MAX_SEGMENTS_PER_PAGE);
    const length = segments.reduce((sum, value) => sum + value, 0);
    pages.push({
      headerType: start === 0 ? 0 : CONTINUED_PACKET,
      granulePosition: 0n,
      serial,
      sequence: firstSequence + pages.length,
      segments,
      body: packet.subarray(bodyOffset, bodyOffset + length),
    });
    bodyOffset += length;
  }
  return pages;
}

export function parseOpusTags(packet: Buffer): OpusTags {
  if (packet.length < 16 || !packet.subarray(0, 8).equals(OPUS_TAGS)) {
    throw malformed('Missing OpusTags header');
  }
  let offset = 8;
  const readLength = (): number => {
    if (offset + 4 > packet.length) throw malformed('OpusTags header is truncated');
    const value = packet.readUInt32LE(offset);
    offset += 4;
    return value;
  };
  const readString = (length: number): string => {
    if (offset + length > packet.length) throw malformed('OpusTags header is truncated');
    const value = packet.toString('utf8', offset, offset + length);
    offset += length;
    return value;
  };

  const vendor = readString(readLength());
  const count = readLength();
  const comments: string[] = [];
  for (let i = 0; i < count; i++) {
    comments.push(readString(readLength()));
  }

  return { vendor, comments, trailing: Buffer.from(packet.subarray(offset)) };
}

export function buildOpusTags(tags: OpusTags): Buffer {
  const u32 = (value: number) => {
    const bytes = Buffer.alloc(4);
    bytes.writeUInt32LE(value, 0);
    return bytes;
  };
  const parts: Buffer[] = [OPUS_TAGS];
  const vendor = Buffer.from(tags.vendor, 'utf8');
  parts.push(u32(vendor.length), vendor, u32(tags.comments.length));
  for (const comment of tags.comments) {
    const bytes = Buffer.from(comment, 'utf8');
    parts.push(u32(bytes.length), bytes);
  }
  parts.push(tags.trailing);
  return Buffer.concat(parts);
}

interface HeaderLayout {
  pages: OggPage[];
  serial: number;
  /** Indexes into pages of the pages holding the comment packet */
  tagPageIndexes: number[];
  packet: Buffer;
}

/**
 * Locate the OpusTags packet: the second packet of the first logical stream.
 * It must start and end on page boundaries.
 */
function locateCommentHeader(file: Buffer): HeaderLayout {
  const pages = parseOggPages(file);
  if (pages.length === 0) {
    throw malformed('File contains no Ogg pages');
  }
  const head = pages[0];
  if (!head.body.subarray(0, 8).equals(OPUS_HEAD)) {
    throw malformed('Not an Ogg Opus stream');
  }
  const serial = head.serial;

  const tagPageIndexes: number[] = [];
  const chunks: Buffer[] = [];
  let complete = false;

  for (let index = 1; index < pages.length && !complete; index++) {
    const page = pages[index];
    if (page.serial !== serial) continue;

    const continued = (page.headerType & CONTINUED_PACKET) !== 0;
    if (tagPageIndexes.length === 0 && continued) {
      throw malformed('Comment header does not start on a page boundary');
    }
    tagPageIndexes.push(index);

    let bodyOffset = 0;
    for (const [segmentIndex, size] of page.segments.entries()) {
      chunks.push(page.body.subarray(bodyOffset, bodyOffset + size));
      bodyOffset += size;
      if (size < 255) {
        if (segmentIndex !== page.segments.length - 1) {
          throw malformed('Comment header shares its last page with audio data');
        }
        complete = true;
      }
    }
  }

  if (!complete) {
    throw malformed('Comment header is incomplete');
  }
  return { pages, serial, tagPageIndexes, packet: Buffer.concat(chunks) };
}

export function readOpusTags(file: Buffer): OpusTags {
  return parseOpusTags(locateCommentHeader(file).packet);
}

/**
 * Return a copy of file with its comment header replaced by update(current)
 */
export function rewriteOpusTags(file: Buffer, update: (current: OpusTags) => OpusTags): Buffer {
  const { pages, serial, tagPageIndexes, packet } = locateCommentHeader(file);
  const replacement = buildOpusTags(update(parseOpusTags(packet)));

  const firstTagPage = pages[tagPageIndexes[0]];
  const newTagPages = paginatePacket(replacement, serial, firstTagPage.sequence);
  const shift = newTagPages.length - tagPageIndexes.length;
  const lastTagIndex = tagPageIndexes[tagPageIndexes.length - 1];

  const output: Buffer[] = [];
  for (const [index, page] of pages.entries()) {
    if (index === tagPageIndexes[0]) {
      output.push(...newTagPages.map(serializeOggPage));
      continue;
    }
    if (tagPageIndexes.includes(index)) {
      continue;
    }
    if (index > lastTagIndex && page.serial === serial && shift !== 0) {
      output.push(serializeOggPage({ ...page, sequence: page.sequence + shift }));
      continue;
    }
    output.push(serializeOggPage(page));
  }
  return Buffer.concat(output);
}

function commentKey(comment: string): string {
  const separator = comment.indexOf('=');
  return (separator === -1 ? comment : comment.slice(0, separator)).toUpperCase();
}

/**
 * Replace any embedded pictures with the given base64 picture block
 */
export function setCoverPicture(file: Buffer, pictureComment: string): Buffer {
  return rewriteOpusTags(file, (tags) => ({
    ...tags,
    comments: [
      ...tags.comments.filter((comment) => {
        const key = commentKey(comment);
        return key !== PICTURE_COMMENT_KEY && key !== LEGACY_COVER_KEY;
      }),
      `${PICTURE_COMMENT_KEY}=${pictureComment}`,
    ],
  }));
}
