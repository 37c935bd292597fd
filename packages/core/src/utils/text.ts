const ELLIPSIS = '…';

/**
 * Cuts `text` to at most `maxLength` characters (code points), the last of
 * which is the ellipsis marking the cut.
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  if (maxLength <= 0) return '';
  return `${chars.slice(0, maxLength - 1).join('').trimEnd()}${ELLIPSIS}`;
}

export function capitalize(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function errorType(error: unknown): string {
  if (error instanceof Error) return error.name || 'Error';
  return typeof error;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** `"{Type}: {message}"` with the message truncated for user-facing text. */
export function describeError(error: unknown, maxLength: number): string {
  return `${errorType(error)}: ${truncate(errorMessage(error), maxLength)}`;
}
