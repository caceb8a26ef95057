import * as fs from 'fs';
import * as path from 'path';
import * as log from '../utils/logger';
import { runCommand, type CommandRunner } from './command';

export const EDGE_TTS_COMMAND = 'edge-tts';

export class SpeechSynthesisError extends Error {
  readonly status: number | null;
  readonly stderr: string;

  constructor(status: number | null, stderr: string) {
    super(`[TTS_FAILED] status=${status ?? 'null'} stderr=${stderr.trim() || '(empty)'}`);
    this.name = 'SpeechSynthesisError';
    this.status = status;
    this.stderr = stderr;
  }
}

export function buildEdgeTtsArgs(text: string, voice: string, outputPath: string): string[] {
  return ['--text', text, '--voice', voice, '--write-media', outputPath];
}

export function synthesizeSpeech(
  text: string,
  voice: string,
  outputPath: string,
  runner: CommandRunner = runCommand,
): string {
  if (!text.trim()) {
    throw new SpeechSynthesisError(null, 'text is empty');
  }
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const result = runner(EDGE_TTS_COMMAND, buildEdgeTtsArgs(text, voice, outputPath));
  if (result.error) {
    throw new SpeechSynthesisError(result.status, `${EDGE_TTS_COMMAND} 실행 실패: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new SpeechSynthesisError(result.status, result.stderr);
  }
  log.info(`[tts] voice=${voice} output=${outputPath}`);
  return outputPath;
}
