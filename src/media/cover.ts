/**
 * cover.ts - 세로형 표지 이미지 생성
 *
 * 첫 줄은 제목, 나머지는 본문. 검은 배경에 흰 글씨로 가운데 정렬한다.
 * 글자 폭은 폰트 없이 추정하고 SVG를 sharp로 PNG 렌더링한다.
 */

import sharp from 'sharp';
import * as fs from 'fs';
import * as path from 'path';
import * as log from '../utils/logger';

export const COVER_WIDTH = 1080;
export const COVER_HEIGHT = 1920;
export const COVER_MARGIN = 80;

const INITIAL_HEADING_SIZE = 90;
const MIN_HEADING_SIZE = 40;
const HEADING_SHRINK_STEP = 10;
const FONT_FAMILY = 'Noto Sans CJK SC, WenQuanYi Zen Hei, PingFang SC, Microsoft YaHei, sans-serif';

export type CoverText = {
  heading: string;
  bodyLines: string[];
};

export type CoverLine = {
  text: string;
  fontSize: number;
  /** 줄 상단 y */
  top: number;
};

export type CoverLayout = {
  headingSize: number;
  bodySize: number;
  spacing: number;
  gap: number;
  totalHeight: number;
  lines: CoverLine[];
};

/** CLI 인자로 들어온 리터럴 "\n"도 줄바꿈으로 본다 */
export function parseCoverText(raw: string): CoverText {
  const lines = raw.replace(/\\n/g, '\n').split('\n');
  return {
    heading: (lines[0] ?? '').trim(),
    bodyLines: lines.slice(1).map((l) => l.trim()).filter((l) => l.length > 0),
  };
}

function isWideChar(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return (code >= 0x2e80 && code <= 0x9fff)
    || (code >= 0xac00 && code <= 0xd7af)
    || (code >= 0xf900 && code <= 0xfaff)
    || (code >= 0xfe30 && code <= 0xfe4f)
    || (code >= 0xff00 && code <= 0xffef)
    || code >= 0x20000;
}

/** CJK는 1em, 그 외는 0.55em */
export function estimateWidth(text: string, fontSize: number): number {
  let units = 0;
  for (const ch of text) {
    units += isWideChar(ch) ? 1 : 0.55;
  }
  return units * fontSize;
}

/** 글자 단위 줄바꿈 */
export function wrapLine(text: string, fontSize: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const ch of text) {
    const candidate = current + ch;
    if (estimateWidth(candidate, fontSize) <= maxWidth) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);
    current = ch;
  }
  if (current) lines.push(current);
  return lines;
}

type Metrics = { headingSize: number; bodySize: number; spacing: number; gap: number };

function metricsFor(headingSize: number): Metrics {
  return {
    headingSize,
    bodySize: Math.floor(headingSize * 0.67),
    spacing: Math.floor(headingSize * 0.4),
    gap: Math.floor(headingSize * 0.67),
  };
}

function measure(cover: CoverText, m: Metrics, maxWidth: number): { heading: string[]; body: string[]; total: number } {
  const heading = cover.heading ? wrapLine(cover.heading, m.headingSize, maxWidth) : [];
  const body = cover.bodyLines.flatMap((line) => wrapLine(line, m.bodySize, maxWidth));
  let total = 0;
  for (let i = 0; i < heading.length; i++) total += m.headingSize + m.spacing;
  if (heading.length > 0 && body.length > 0) total += m.gap - m.spacing;
  for (let i = 0; i < body.length; i++) total += m.bodySize + m.spacing;
  if (heading.length + body.length > 0) total -= m.spacing;
  return { heading, body, total };
}

/**
 * 블록이 세로 여백 안에 들어갈 때까지 제목 크기를 10씩 줄인다 (최소 40).
 * 첫 시도만 기본 비율(본문 60, 간격 40, 제목-본문 60)을 쓴다.
 */
export function layoutCover(cover: CoverText): CoverLayout {
  const maxWidth = COVER_WIDTH - COVER_MARGIN * 2;
  const maxHeight = COVER_HEIGHT - COVER_MARGIN * 2;

  let metrics: Metrics = { headingSize: INITIAL_HEADING_SIZE, bodySize: 60, spacing: 40, gap: 60 };
  let measured = measure(cover, metrics, maxWidth);
  while (measured.total > maxHeight && metrics.headingSize - HEADING_SHRINK_STEP >= MIN_HEADING_SIZE) {
    metrics = metricsFor(metrics.headingSize - HEADING_SHRINK_STEP);
    measured = measure(cover, metrics, maxWidth);
  }

  const lines: CoverLine[] = [];
  let y = Math.floor((COVER_HEIGHT - measured.total) / 2);
  for (const text of measured.heading) {
    lines.push({ text, fontSize: metrics.headingSize, top: y });
    y += metrics.headingSize + metrics.spacing;
  }
  if (measured.heading.length > 0 && measured.body.length > 0) {
    y += metrics.gap - metrics.spacing;
  }
  for (const text of measured.body) {
    lines.push({ text, fontSize: metrics.bodySize, top: y });
    y += metrics.bodySize + metrics.spacing;
  }

  return { ...metrics, totalHeight: measured.total, lines };
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildCoverSvg(layout: CoverLayout): string {
  const texts = layout.lines.map((line) =>
    `  <text x="${COVER_WIDTH / 2}" y="${line.top + line.fontSize}" font-size="${line.fontSize}" `
    + `text-anchor="middle" fill="#ffffff" font-family="${FONT_FAMILY}">${escapeXml(line.text)}</text>`,
  );
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${COVER_WIDTH}" height="${COVER_HEIGHT}">`,
    `  <rect width="100%" height="100%" fill="#000000"/>`,
    ...texts,
    '</svg>',
  ].join('\n');
}

export async function renderCover(rawText: string, outputPath: string): Promise<string> {
  const layout = layoutCover(parseCoverText(rawText));
  const svg = buildCoverSvg(layout);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  await sharp(Buffer.from(svg)).png().toFile(outputPath);
  log.info(`[cover] lines=${layout.lines.length} heading=${layout.headingSize}px output=${outputPath}`);
  return outputPath;
}
