export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Splits on line breaks (`<br>` already rendered to newlines), collapsing each entry. */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(collapseWhitespace)
    .filter(Boolean);
}
