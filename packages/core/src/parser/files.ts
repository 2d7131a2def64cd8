import type { FileEntry } from '../schemas.js';

export const VIDEO_FILE_EXTENSIONS = [
  '.yuv',
  '.wmv',
  '.webm',
  '.vob',
  '.viv',
  '.svi',
  '.roq',
  '.rmvb',
  '.rm',
  '.ogv',
  '.ogg',
  '.nsv',
  '.mxf',
  '.mts',
  '.m2ts',
  '.ts',
  '.mpg',
  '.mpeg',
  '.m2v',
  '.mp2',
  '.mpe',
  '.mpv',
  '.mp4',
  '.m4p',
  '.m4v',
  '.mov',
  '.qt',
  '.mng',
  '.mkv',
  '.flv',
  '.drc',
  '.avi',
  '.asf',
  '.amv',
];

export const SUBTITLE_FILE_EXTENSIONS = [
  '.srt',
  '.ass',
  '.vtt',
  '.sub',
  '.idx',
  '.pgs',
];

const SAMPLE_PATTERN = /sample/i;
export const SEASON_PATTERN = /(?:season|s)[.\-_\s]?(\d+)/i;
export const EPISODE_PATTERN = /(?:episode|e)[.\-_\s]?(\d+)/i;

const hasExtension = (name: string, extensions: string[]) => {
  const lower = name.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext));
};

export function isVideoFile(name: string): boolean {
  return (
    !SAMPLE_PATTERN.test(name) && hasExtension(name, VIDEO_FILE_EXTENSIONS)
  );
}

export function isSubtitleFile(name: string): boolean {
  return hasExtension(name, SUBTITLE_FILE_EXTENSIONS);
}

function matchNumber(pattern: RegExp, name: string): number | undefined {
  const match = pattern.exec(name);
  return match?.[1] !== undefined ? Number(match[1]) : undefined;
}

/**
 * Classifies one reported file purely from its name. `size` is in bytes and
 * is stored as decimal gigabytes.
 */
export function classifyFile(id: string, name: string, size: number): FileEntry {
  return {
    id,
    name,
    sizeGB: size / 1e9,
    isVideo: isVideoFile(name),
    isSubtitle: isSubtitleFile(name),
    season: matchNumber(SEASON_PATTERN, name),
    episode: matchNumber(EPISODE_PATTERN, name),
  };
}
