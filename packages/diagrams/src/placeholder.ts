import fs from "node:fs/promises";

/** 1×1 transparent PNG, written when every render attempt has failed. */
export const MINIMAL_PNG = Buffer.from(
  "89504e470d0a1a0a0000000d49484452000000010000000108060000001f15c4" +
    "890000000d4944415478da6364f8ffbf0600050001e36172eb0000000049454e44ae426082",
  "hex",
);

export function failureMarkerPath(pngPath: string): string {
  return `${pngPath}.error`;
}

export async function writeFailurePlaceholder(params: {
  pngPath: string;
  slideNumber: number;
  kind: string;
  lastError: string;
}): Promise<void> {
  const marker = [
    `Failed to render diagram for slide ${params.slideNumber}`,
    `Original diagram type: ${params.kind}`,
    `Error: ${params.lastError}`,
    "",
  ].join("\n");

  await fs.writeFile(failureMarkerPath(params.pngPath), marker, "utf8");
  await fs.writeFile(params.pngPath, MINIMAL_PNG);
}
