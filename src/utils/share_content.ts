export type ShareText = {
  title: string;
  content: string;
};

/** 다른 플랫폼 이름과 @계정을 지운다 */
const CONTENT_REPLACEMENTS: ReadonlyArray<[RegExp, string]> = [
  [/推特/gi, '某平台'],
  [/twitter/gi, '某平台'],
  [/x\.com/gi, '某平台'],
  [/tweet/gi, '帖子'],
  [/推文/gi, '帖子'],
  [/@[\p{L}\p{N}_]+/gu, ''],
];

export function sanitizeContent(text: string): string {
  return CONTENT_REPLACEMENTS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), text);
}

/** 첫 줄은 제목, 나머지는 본문. 본문이 없으면 제목을 본문으로 쓴다 */
export function parseShareText(raw: string): ShareText {
  const trimmed = raw.trim();
  const newline = trimmed.indexOf('\n');
  if (newline < 0) return { title: trimmed, content: trimmed };
  const title = trimmed.slice(0, newline).trim();
  const content = trimmed.slice(newline + 1).trim();
  return { title, content: content || title };
}

/** 게시물 설명은 본문 앞부분만 쓴다 */
export function toShareDescription(content: string, maxChars: number = 100): string {
  return Array.from(content).slice(0, maxChars).join('');
}
