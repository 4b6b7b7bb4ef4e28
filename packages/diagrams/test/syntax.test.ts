import { describe, expect, it } from "vitest";

import {
  diagramFallbacks,
  fallbackDiagramSource,
  isValidDiagramSyntax,
  placeholderDiagramSource,
  repairDiagramSyntax,
  stripCodeFence,
} from "../src/syntax.js";

describe("isValidDiagramSyntax", () => {
  it("accepts sources that open with a diagram type", () => {
    expect(isValidDiagramSyntax("flowchart TD\n  A")).toBe(true);
    expect(isValidDiagramSyntax("  stateDiagram-v2\n  [*] --> S")).toBe(true);
    expect(isValidDiagramSyntax("pie")).toBe(true);
  });

  it("accepts sources that contain edge tokens", () => {
    expect(isValidDiagramSyntax("A --> B")).toBe(true);
    expect(isValidDiagramSyntax("A -.-> B")).toBe(true);
  });

  it("rejects prose and lookalike words", () => {
    expect(isValidDiagramSyntax("A then B")).toBe(false);
    expect(isValidDiagramSyntax("graphic design")).toBe(false);
  });
});

describe("repairDiagramSyntax", () => {
  it("substitutes a placeholder for empty sources", () => {
    expect(repairDiagramSyntax("  ", "flowchart")).toBe("flowchart TD\n    A[Start] --> B[Process]");
    expect(repairDiagramSyntax("", "mindmap")).toBe("mindmap\n    root(Main Topic)");
    expect(repairDiagramSyntax("", "timeline")).toBe("timeline\n    A[Item 1]");
  });

  it("adds a missing diagram type", () => {
    expect(repairDiagramSyntax("A[One]\nB[Two]", "flowchart")).toBe("flowchart TD\nA[One]\nB[Two]");
    expect(repairDiagramSyntax('"Dogs" : 3', "pie")).toBe('pie\n"Dogs" : 3');
  });

  it("leaves valid sources alone", () => {
    expect(repairDiagramSyntax("A --> B", "mindmap")).toBe("A --> B");
  });
});

describe("fallbacks", () => {
  it("looks kinds up case-insensitively", () => {
    expect(diagramFallbacks("quadrantChart")).toEqual(["quadrantChart", "flowchart"]);
    expect(diagramFallbacks("Mindmap")).toEqual(["mindmap", "flowchart TD", "flowchart LR"]);
    expect(diagramFallbacks("sankey")).toEqual(["flowchart TD"]);
  });

  it("builds a two-node flowchart from the fallback list", () => {
    expect(fallbackDiagramSource("flowchart")).toBe("flowchart TD\n    A[Start] --> B[End]");
    expect(fallbackDiagramSource("quadrantChart")).toBe("flowchart\n    A[Start] --> B[End]");
    expect(fallbackDiagramSource("pie")).toBe("flowchart TD\n    A[Start] --> B[End]");
  });
});

describe("placeholderDiagramSource", () => {
  it("keeps the caller's spelling for other kinds", () => {
    expect(placeholderDiagramSource("classDiagram")).toBe("classDiagram\n    A[Item 1]");
  });
});

describe("stripCodeFence", () => {
  it("removes fences and a mermaid info line", () => {
    expect(stripCodeFence("```mermaid\nflowchart TD\n  A --> B\n```")).toBe("flowchart TD\n  A --> B");
    expect(stripCodeFence("```\npie\n```")).toBe("pie");
    expect(stripCodeFence("  graph LR\n A-->B ")).toBe("graph LR\n A-->B");
  });
});
