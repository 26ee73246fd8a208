/**
 * Cleanup for generated post text.
 */

const WRAPPER_TAGS = [
  '<AgentOutput>',
  '</AgentOutput>',
  '<Post>',
  '</Post>',
  '<Output>',
  '</Output>',
] as const;

/**
 * Strip wrapper tags and a leading stray tag, collapse runs of blank lines
 * and trim.
 */
export function cleanPost(text: string): string {
  let cleaned = text.trim();

  for (const tag of WRAPPER_TAGS) {
    cleaned = cleaned.split(tag).join('');
  }

  if (cleaned.startsWith('<')) {
    const close = cleaned.indexOf('>');
    if (close !== -1) {
      cleaned = cleaned.slice(close + 1).trim();
    }
  }

  const lines: string[] = [];
  let previousBlank = false;
  for (const line of cleaned.split('\n')) {
    const blank = line.trim() === '';
    if (blank && previousBlank) {
      continue;
    }
    lines.push(line);
    previousBlank = blank;
  }

  return lines.join('\n').trim();
}
