/**
 * Content cleanup shared by indexing, querying and rendering
 */

// Transport placeholders written before a voice/image message is processed
const PROCESSING_PLACEHOLDER = /\[(?:voice|image)\s*:\s*processing(?:\.\.\.|…)?\]/gi;
const IMAGE_SUMMARY = /\[Image Summary\s*:(.*?)\]/gi;
const CHAT_WRAPPER = /<chat[^>]*>([\s\S]*?)<\/chat>/gi;
const ANY_TAG = /<[^>]+>/g;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Normalize stored message content into the text that gets embedded or shown.
 *
 * Assistant replies are stored wrapped in `<chat ...>` tags by the sender; when
 * present only the wrapped text is kept. Otherwise any markup is stripped.
 */
export function sanitizeContent(text: string | null | undefined): string {
  if (!text) return "";

  let cleaned = text.replace(IMAGE_SUMMARY, "Image content:$1");
  cleaned = cleaned.replace(PROCESSING_PLACEHOLDER, "");

  const wrapped = Array.from(cleaned.matchAll(CHAT_WRAPPER), (match) => match[1].trim());
  if (wrapped.length > 0) {
    return collapseWhitespace(wrapped.join(" "));
  }

  return collapseWhitespace(cleaned.replace(ANY_TAG, ""));
}

export interface TruncateOptions {
  maxChars: number;
  headRatio: number;
  tailRatio: number;
}

/**
 * Cut oversized content down to a head and a tail around an elision marker.
 *
 * With `headRatio + tailRatio` leaving room for the marker the output is never
 * longer than `maxChars`, so truncating twice yields the same text.
 */
export function truncateContent(text: string, options: TruncateOptions): string {
  if (text.length <= options.maxChars) return text;

  const headLength = Math.floor(options.maxChars * options.headRatio);
  const tailLength = Math.floor(options.maxChars * options.tailRatio);
  const omitted = text.length - headLength - tailLength;
  const marker = `\n\n[... ${omitted} chars omitted ...]\n\n`;

  return text.slice(0, headLength) + marker + text.slice(text.length - tailLength);
}
