/**
 * Text Processor
 * Turns the raw text of scraped elements into clean cell values
 */

export type UnicodeNormalizationForm = 'NFC' | 'NFD' | 'NFKC' | 'NFKD';

export interface TextProcessorOptions {
  normalizeForm?: UnicodeNormalizationForm;
  /** Keep line structure, with at most one blank line between paragraphs */
  preserveParagraphs?: boolean;
  /** Cut the result to this many characters */
  maxLength?: number;
}

export interface ProcessedText {
  text: string;
  originalLength: number;
  truncated: boolean;
}

// C0 controls except tab/LF/CR, DEL, zero-width and bidi control characters
const INVISIBLE_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\u200B-\u200D\uFEFF\u202A-\u202E\u2066-\u2069]/g;

export function removeInvisibleCharacters(text: string): string {
  return text.replace(INVISIBLE_CHARS, '');
}

export function collapseToLine(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function collapseParagraphs(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(collapseToLine)
    .join('\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export class TextProcessor {
  private readonly defaults: TextProcessorOptions;

  constructor(defaults: TextProcessorOptions = {}) {
    this.defaults = defaults;
  }

  process(text: string, options: TextProcessorOptions = {}): ProcessedText {
    const form = options.normalizeForm ?? this.defaults.normalizeForm ?? 'NFC';
    const preserveParagraphs = options.preserveParagraphs ?? this.defaults.preserveParagraphs ?? false;
    const maxLength = options.maxLength ?? this.defaults.maxLength;

    const visible = removeInvisibleCharacters(text.normalize(form));
    let cleaned = preserveParagraphs ? collapseParagraphs(visible) : collapseToLine(visible);

    let truncated = false;
    if (maxLength !== undefined && cleaned.length > maxLength) {
      cleaned = cleaned.slice(0, maxLength).trimEnd();
      truncated = true;
    }

    return { text: cleaned, originalLength: text.length, truncated };
  }
}

export const textProcessor = new TextProcessor();

/**
 * Single-line clean-up used for most fields
 */
export function cleanText(text: string): string {
  return textProcessor.process(text).text;
}
