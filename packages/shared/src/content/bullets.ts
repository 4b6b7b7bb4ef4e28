const BULLET_MARKERS = ["- ", "* ", "• "];

/**
 * Turn a body block into bullet texts: trimmed lines, blanks dropped, one
 * leading marker stripped.
 */
export function extractBullets(content: string | null | undefined): string[] {
  if (!content) return [];

  const bullets: string[] = [];
  for (const rawLine of content.split("\n")) {
    let line = rawLine.trim();
    if (!line) continue;
    const marker = BULLET_MARKERS.find((m) => line.startsWith(m));
    if (marker) line = line.slice(marker.length).trim();
    bullets.push(line);
  }
  return bullets;
}

/** Canonical markdown bullet form (`* item`) used by the deck-markup backend. */
export function normalizeBulletMarkers(content: string): string {
  return content
    .replace(/^[ \t]*[-*][ \t]+/gm, "* ")
    .replace(/\n{3,}/g, "\n\n");
}
