/**
 * Local Mermaid source checks and the static fallback table used by the
 * resolver's third attempt.
 */

export const DIAGRAM_TYPE_TOKENS = [
  "flowchart",
  "graph",
  "mindmap",
  "classDiagram",
  "pie",
  "quadrantChart",
  "timeline",
  "sequenceDiagram",
  "stateDiagram-v2",
  "stateDiagram",
  "gantt",
  "journey",
  "gitGraph",
  "erDiagram",
] as const;

export const EDGE_TOKENS = ["-->", "-.->", "===>", "-->|", "-.->|", "==>|", "---|", "-.-|", "===|"] as const;

const DIAGRAM_TYPE_PATTERN = new RegExp(`^(${DIAGRAM_TYPE_TOKENS.join("|")})(?=\\s|$)`);

const DIAGRAM_FALLBACKS: Record<string, readonly string[]> = {
  flowchart: ["flowchart TD", "flowchart LR", "flowchart RL", "mindmap"],
  mindmap: ["mindmap", "flowchart TD", "flowchart LR"],
  pie: ["pie", "flowchart TD"],
  quadrantchart: ["quadrantChart", "flowchart"],
  classdiagram: ["classDiagram", "flowchart TD"],
  timeline: ["timeline", "flowchart TD"],
};

const DEFAULT_FALLBACKS: readonly string[] = ["flowchart TD"];

export function isValidDiagramSyntax(source: string): boolean {
  if (DIAGRAM_TYPE_PATTERN.test(source.trim())) return true;
  return EDGE_TOKENS.some((token) => source.includes(token));
}

export function placeholderDiagramSource(kind: string): string {
  switch (kind.trim().toLowerCase()) {
    case "flowchart":
      return "flowchart TD\n    A[Start] --> B[Process]";
    case "mindmap":
      return "mindmap\n    root(Main Topic)";
    default:
      return `${kind.trim()}\n    A[Item 1]`;
  }
}

/**
 * Make sure the source opens with a diagram type. Empty sources become a
 * placeholder of the requested kind; valid sources pass through untouched.
 */
export function repairDiagramSyntax(source: string, kind: string): string {
  if (source.trim() === "") return placeholderDiagramSource(kind);
  if (isValidDiagramSyntax(source)) return source;

  const lowerKind = kind.trim().toLowerCase();
  const lowerSource = source.trim().toLowerCase();
  if (lowerKind === "flowchart" && !lowerSource.startsWith("flowchart")) {
    return `flowchart TD\n${source}`;
  }
  if (!lowerSource.startsWith(lowerKind)) {
    return `${kind.trim()}\n${source}`;
  }
  return source;
}

export function diagramFallbacks(kind: string): readonly string[] {
  return DIAGRAM_FALLBACKS[kind.trim().toLowerCase()] ?? DEFAULT_FALLBACKS;
}

/**
 * Minimal two-node diagram in the first flowchart-family entry of the kind's
 * fallback list.
 */
export function fallbackDiagramSource(kind: string): string {
  const header =
    diagramFallbacks(kind).find((entry) => /^(flowchart|graph)\b/.test(entry)) ?? DEFAULT_FALLBACKS[0];
  return `${header}\n    A[Start] --> B[End]`;
}

/** Remove a surrounding ``` fence and a leading `mermaid` info line. */
export function stripCodeFence(text: string): string {
  let out = text.trim();
  if (out.startsWith("```") && out.endsWith("```") && out.length >= 6) {
    out = out.slice(3, -3).trim();
    if (out.startsWith("mermaid\n")) out = out.slice("mermaid\n".length).trim();
  }
  return out;
}
