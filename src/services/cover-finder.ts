import * as fs from 'fs';
import * as path from 'path';

export const SUPPORTED_COVER_EXTENSIONS = ['.jpg', '.jpeg', '.png'];
export const COMMON_COVER_NAMES = ['cover.jpg', 'cover.jpeg', 'cover.png', 'album.jpg', 'folder.jpg'];

/**
 * Cover art for an audio file: same base name first, then a common album cover
 * name, then any supported image in the folder.
 */
export function findCoverForSong(audioPath: string): string | null {
  const folder = path.dirname(audioPath);
  const baseName = path.parse(audioPath).name;

  for (const extension of SUPPORTED_COVER_EXTENSIONS) {
    const candidate = path.join(folder, `${baseName}${extension}`);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  for (const name of COMMON_COVER_NAMES) {
    const candidate = path.join(folder, name);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  const anyImage = fs
    .readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isFile() && SUPPORTED_COVER_EXTENSIONS.includes(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()[0];

  return anyImage ? path.join(folder, anyImage) : null;
}

export function mimeTypeForCover(coverPath: string): string {
  return path.extname(coverPath).toLowerCase() === '.png' ? 'image/png' : 'image/jpeg';
}
