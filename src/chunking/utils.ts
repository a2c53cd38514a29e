export const PARAGRAPH_SEPARATOR = '\n\n';

const PARAGRAPH_BREAK = /\n\n+/g;

export interface Paragraph {
  text: string;
  start: number;
  separatorLength: number; // length of the blank-line run that follows, 0 for the last paragraph
}

/**
 * Splits on blank-line runs and keeps each paragraph's position in the source.
 */
export function splitParagraphsWithOffsets(text: string): Paragraph[] {
  const paragraphs: Paragraph[] = [];
  let last = 0;
  for (const match of text.matchAll(PARAGRAPH_BREAK)) {
    const index = match.index ?? 0;
    paragraphs.push({
      text: text.slice(last, index),
      start: last,
      separatorLength: match[0].length,
    });
    last = index + match[0].length;
  }
  paragraphs.push({ text: text.slice(last), start: last, separatorLength: 0 });
  return paragraphs;
}

/**
 * Non-blank paragraphs of a text, in order.
 */
export function splitParagraphs(text: string): string[] {
  return text.split(PARAGRAPH_BREAK).filter((p) => p.trim().length > 0);
}

export function truncateWithEllipsis(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}...` : text;
}
