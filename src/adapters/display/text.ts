const ELLIPSIS = '...';

/** Truncates to `maxChars`, marking the cut with an ellipsis. */
export function fitText(text: string, maxChars: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length <= maxChars) {
    return clean;
  }
  if (maxChars <= ELLIPSIS.length) {
    return clean.slice(0, Math.max(0, maxChars));
  }
  return `${clean.slice(0, maxChars - ELLIPSIS.length).trimEnd()}${ELLIPSIS}`;
}

/** Scale factor that fits `width`x`height` inside the box without enlarging. */
export function fitScale(width: number, height: number, maxWidth: number, maxHeight: number): number {
  if (width <= 0 || height <= 0) {
    return 1;
  }
  return Math.min(1, maxWidth / width, maxHeight / height);
}
