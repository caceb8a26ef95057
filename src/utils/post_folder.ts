import * as fs from 'fs';
import * as path from 'path';
import * as log from './logger';

export const POST_JSON_FILENAME = 'post.json';
export const COVER_FILENAME = 'cover.png';
export const MUSIC_FILENAME = 'music.mp3';
export const AUDIO_FILENAME = 'audio.mp3';
export const VIDEO_FILENAME = 'video.mp4';

export type PostMeta = {
  title: string;
  body: string;
  cover: string;
};

export type PostFolder = {
  dir: string;
  coverPath: string;
  meta: PostMeta;
};

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** 로컬 시각 기준 YYYYMMDD_HHMMSS */
export function formatFolderTimestamp(now: Date): string {
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
    + `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

/** 첫 줄만 사용하고 파일명에 쓸 수 없는 문자를 제거한다 */
export function sanitizeDirname(text: string, maxLen: number = 50): string {
  const firstLine = (text.split('\n')[0] ?? '').trim();
  return Array.from(firstLine.replace(/[<>:"/\\|?*]/g, '')).slice(0, maxLen).join('');
}

export function splitCoverText(text: string): PostMeta {
  const lines = text.split('\n');
  return {
    title: (lines[0] ?? '').trim(),
    body: lines.slice(1).join('\n').trim(),
    cover: COVER_FILENAME,
  };
}

export function createPostFolder(text: string, dataDir: string, now: Date = new Date()): PostFolder {
  const dir = path.join(dataDir, `${formatFolderTimestamp(now)}_${sanitizeDirname(text)}`);
  fs.mkdirSync(dir, { recursive: true });
  const meta = splitCoverText(text);
  fs.writeFileSync(path.join(dir, POST_JSON_FILENAME), `${JSON.stringify(meta, null, 2)}\n`, 'utf-8');
  log.info(`[post_folder] created ${dir}`);
  return { dir, coverPath: path.join(dir, COVER_FILENAME), meta };
}

/** 이름이 타임스탬프로 시작하므로 사전순 최댓값이 가장 최근 폴더다 */
export function findLatestPostFolder(dataDir: string): string | null {
  if (!fs.existsSync(dataDir)) return null;
  const dirs = fs.readdirSync(dataDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
  const latest = dirs[dirs.length - 1];
  return latest ? path.join(dataDir, latest) : null;
}

export function resolveMusicOutput(dataDir: string): string {
  const latest = findLatestPostFolder(dataDir);
  if (latest) return path.join(latest, MUSIC_FILENAME);
  fs.mkdirSync(dataDir, { recursive: true });
  return path.join(dataDir, MUSIC_FILENAME);
}
