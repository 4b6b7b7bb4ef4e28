export type ColumnSplit = [left: string, right: string];

export const COLUMN_SEPARATOR = "|";

const BULLET_LINE = /^\s*[-*]\s+/;

export function isBulletLine(line: string): boolean {
  return BULLET_LINE.test(line);
}

/**
 * Divide a content block into two column blocks, preserving order.
 *
 * 1. A `|` splits once; both sides are trimmed.
 * 2. Otherwise, with bullet lines present, the split lands on the bullet at
 *    index floor(count / 2): the right side takes the extra bullet on odd
 *    counts, and non-bullet lines stay with the bullet that follows them.
 * 3. Otherwise lines are split at floor(lineCount / 2).
 */
export function splitContentIntoColumns(content: string | null | undefined): ColumnSplit {
  if (!content) return ["", ""];

  const separatorAt = content.indexOf(COLUMN_SEPARATOR);
  if (separatorAt !== -1) {
    return [
      content.slice(0, separatorAt).trim(),
      content.slice(separatorAt + COLUMN_SEPARATOR.length).trim(),
    ];
  }

  const lines = content.split("\n");
  const bulletIndices: number[] = [];
  lines.forEach((line, index) => {
    if (isBulletLine(line)) bulletIndices.push(index);
  });

  if (bulletIndices.length > 0) {
    const midpoint = bulletIndices[Math.floor(bulletIndices.length / 2)] ?? 0;
    return [lines.slice(0, midpoint).join("\n"), lines.slice(midpoint).join("\n")];
  }

  const midpoint = Math.floor(lines.length / 2);
  return [lines.slice(0, midpoint).join("\n"), lines.slice(midpoint).join("\n")];
}
