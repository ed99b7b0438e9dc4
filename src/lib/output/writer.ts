import fs from 'node:fs/promises';
import path from 'node:path';

const MAX_FILENAME_LENGTH = 100;
const DEFAULT_OUTPUT_DIR = 'outputs';

export type SaveOutputOptions = {
  outputDir?: string;
  now?: Date;
};

export const sanitizeTitle = (title: string): string => {
  const cleaned = title.replace(/[^\p{L}\p{N}_\s]/gu, '').replace(/\s+/g, '_');

  // Count code points so an astral letter is never cut in half.
  return Array.from(cleaned).slice(0, MAX_FILENAME_LENGTH).join('');
};

const pad = (value: number): string => value.toString().padStart(2, '0');

/** Local time as `YYYYMMDDHHMMSS`. */
export const formatTimestamp = (date: Date): string =>
  [
    date.getFullYear().toString(),
    pad(date.getMonth() + 1),
    pad(date.getDate()),
    pad(date.getHours()),
    pad(date.getMinutes()),
    pad(date.getSeconds())
  ].join('');

export const buildOutputFilename = (title: string, now: Date): string =>
  `${sanitizeTitle(title)}_${formatTimestamp(now)}.txt`;

/**
 * Writes `content` to `<outputDir>/<sanitized title>_<timestamp>.txt` and
 * returns the absolute path. The directory is resolved against the working
 * directory and created when missing. Existing files are overwritten.
 */
export const saveOutput = async (
  title: string,
  content: string,
  options: SaveOutputOptions = {}
): Promise<string> => {
  const outputDir = path.resolve(options.outputDir ?? DEFAULT_OUTPUT_DIR);
  const filePath = path.join(outputDir, buildOutputFilename(title, options.now ?? new Date()));

  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');

  return filePath;
};
