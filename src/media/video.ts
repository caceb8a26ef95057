import * as fs from 'fs';
import * as path from 'path';
import * as log from '../utils/logger';
import { runCommand, type CommandRunner } from './command';

export const DURATION_COMMAND = 'ffprobe';
export const FFMPEG_COMMAND = 'ffmpeg';

export type VideoStage = 'duration' | 'encode';

export class VideoCompositionError extends Error {
  readonly stage: VideoStage;
  readonly status: number | null;
  readonly stderr: string;

  constructor(stage: VideoStage, status: number | null, stderr: string) {
    super(`[VIDEO_FAILED] stage=${stage} status=${status ?? 'null'} stderr=${stderr.trim() || '(empty)'}`);
    this.name = 'VideoCompositionError';
    this.stage = stage;
    this.status = status;
    this.stderr = stderr;
  }
}

export function buildDurationArgs(audioPath: string): string[] {
  return ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', audioPath];
}

/** 정지 이미지를 반복하고 음성 길이만큼 자른다 */
export function buildFfmpegArgs(imagePath: string, audioPath: string, outputPath: string, durationSec: number): string[] {
  return [
    '-y',
    '-loop', '1',
    '-i', imagePath,
    '-i', audioPath,
    '-c:v', 'libx264',
    '-tune', 'stillimage',
    '-c:a', 'aac',
    '-b:a', '192k',
    '-pix_fmt', 'yuv420p',
    '-shortest',
    '-t', String(durationSec),
    outputPath,
  ];
}

export function readAudioDuration(audioPath: string, runner: CommandRunner = runCommand): number {
  const result = runner(DURATION_COMMAND, buildDurationArgs(audioPath));
  if (result.error) {
    throw new VideoCompositionError('duration', result.status, `${DURATION_COMMAND} 실행 실패: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new VideoCompositionError('duration', result.status, result.stderr);
  }
  const duration = parseFloat(result.stdout.trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new VideoCompositionError('duration', result.status, `invalid duration: ${result.stdout.trim() || '(empty)'}`);
  }
  return duration;
}

/** 표지 이미지 + 음성으로 mp4를 만든다. 길이는 음성 길이를 따른다 */
export function composeVideo(
  imagePath: string,
  audioPath: string,
  outputPath: string,
  runner: CommandRunner = runCommand,
): string {
  const duration = readAudioDuration(audioPath, runner);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const result = runner(FFMPEG_COMMAND, buildFfmpegArgs(imagePath, audioPath, outputPath, duration));
  if (result.error) {
    throw new VideoCompositionError('encode', result.status, `${FFMPEG_COMMAND} 실행 실패: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new VideoCompositionError('encode', result.status, result.stderr);
  }
  log.info(`[video] duration=${duration}s output=${outputPath}`);
  return outputPath;
}
