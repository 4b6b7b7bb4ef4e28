import { describe, expect, it } from "vitest";

import { decodeSlideList, decodeSlideListDetailed, extractSlideArray } from "../src/decode.js";
import { SlideDecodeError } from "../src/errors.js";

describe("extractSlideArray", () => {
  it("accepts a bare list or a slides wrapper", () => {
    expect(extractSlideArray([{ a: 1 }])).toEqual([{ a: 1 }]);
    expect(extractSlideArray({ slides: [{ a: 1 }] })).toEqual([{ a: 1 }]);
  });

  it("falls back to the first list of objects under another key", () => {
    expect(extractSlideArray({ meta: "x", tags: ["a"], deck: [{ title: "T" }] })).toEqual([{ title: "T" }]);
  });

  it("returns null when nothing looks like a slide list", () => {
    expect(extractSlideArray({ title: "x" })).toBeNull();
    expect(extractSlideArray("text")).toBeNull();
  });
});

describe("decodeSlideList", () => {
  it("parses clean JSON directly", () => {
    const result = decodeSlideListDetailed('[{"slide_number": 1, "title": "A"}]');
    expect(result).toEqual({ records: [{ slide_number: 1, title: "A" }], stage: "parse" });
  });

  it("recovers a list surrounded by prose", () => {
    const text = 'Here are the slides:\n```json\n[{"slide_number": 1, "title": "A"}]\n```\nEnjoy!';
    const result = decodeSlideListDetailed(text);
    expect(result.stage).toBe("bracketed");
    expect(result.records).toEqual([{ slide_number: 1, title: "A" }]);
  });

  it("salvages individual records with trailing commas when forced", () => {
    const text = [
      "[",
      '{"slide_number": 1, "title": "A",},',
      '{"slide_number": 2, "title": "B"},',
      '{"slide_number": 3, "title": oops},',
      "",
    ].join("\n");

    const result = decodeSlideListDetailed(text, { force: true });
    expect(result.stage).toBe("fragments");
    expect(result.records).toEqual([
      { slide_number: 1, title: "A" },
      { slide_number: 2, title: "B" },
    ]);
  });

  it("does not salvage without force", () => {
    expect(() => decodeSlideList('[{"slide_number": 1, "title": "A",},')).toThrow(SlideDecodeError);
  });

  it("fails when nothing can be recovered", () => {
    expect(() => decodeSlideList("no slides here", { force: true })).toThrow(
      "No slide records could be recovered from the input",
    );
  });
});
