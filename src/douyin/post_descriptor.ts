import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InvalidPostError } from './errors';
import type { PostDescriptor, PostMediaType } from './types';

export type PostDescriptorInput = {
  images: string[];
  mediaType?: PostMediaType;
  title?: string;
  description?: string;
  hotspot?: string;
  useMusic?: boolean;
  debug?: boolean;
};

type ResolveDeps = {
  cwd: string;
  homeDir: string;
  exists: (filePath: string) => boolean;
};

function defaultDeps(): ResolveDeps {
  return {
    cwd: process.cwd(),
    homeDir: os.homedir(),
    exists: (filePath) => fs.existsSync(filePath) && fs.statSync(filePath).isFile(),
  };
}

export function expandImagePath(raw: string, deps: Pick<ResolveDeps, 'cwd' | 'homeDir'>): string {
  const trimmed = raw.trim();
  if (trimmed === '~') return deps.homeDir;
  if (trimmed.startsWith('~/')) return path.join(deps.homeDir, trimmed.slice(2));
  return path.resolve(deps.cwd, trimmed);
}

export function createPostDescriptor(
  input: PostDescriptorInput,
  deps: Partial<ResolveDeps> = {},
): PostDescriptor {
  const resolved: ResolveDeps = { ...defaultDeps(), ...deps };
  const mediaType = input.mediaType ?? 'image';
  if (input.images.length === 0) {
    throw new InvalidPostError('images=0 (최소 1장 필요)');
  }
  if (mediaType === 'video' && input.images.length !== 1) {
    throw new InvalidPostError(`video=${input.images.length} (영상은 파일 하나만 올린다)`);
  }

  const images = input.images.map((raw) => expandImagePath(raw, resolved));
  const missing = images.filter((p) => !resolved.exists(p));
  if (missing.length > 0) {
    throw new InvalidPostError(`image_not_found=${missing.join(',')}`);
  }

  const hotspot = input.hotspot?.trim();
  return Object.freeze({
    mediaType,
    images: Object.freeze([...images]),
    title: input.title,
    description: input.description,
    hotspot: hotspot ? hotspot : undefined,
    // 영상은 자체 음성이 있어 플랫폼 음악을 붙이지 않는다
    useMusic: mediaType === 'video' ? false : input.useMusic ?? true,
    debug: input.debug ?? false,
  });
}
