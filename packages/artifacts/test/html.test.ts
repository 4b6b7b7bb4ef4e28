import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { normalizeSlides } from "@guidedeck/shared";

import { buildRevealHtml, resolveRevealTheme, revealPageTitle } from "../src/html/revealDeck.js";
import { capturingLogger, failingFetcher, staticFetcher, twoSlideDeck } from "./fixtures.js";

describe("buildRevealHtml", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "guidedeck-html-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("renders both slides and leaves links alone when not embedding", async () => {
    const fetcher = failingFetcher();

    const html = await buildRevealHtml(twoSlideDeck(), { baseDir: dir, fetcher, embedImages: false });

    expect(html).toContain("<title>Intro</title>");
    expect(html).toContain('<section class="title-slide">\n  <h1>Intro</h1>\n  <p>Welcome</p>\n</section>');
    expect(html).toContain(
      '<h2 style="width: 100%">Stats</h2>\n  <div class="columns"><div class="column"></div><div class="column"><img src="http://x/y.png" alt="Stats"></div></div>',
    );
    expect(html).toContain("reveal.js@4.6.0/dist/theme/black.css");
    expect(html).not.toContain("{{");
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  it("inlines fetched images as data URIs", async () => {
    const html = await buildRevealHtml(twoSlideDeck(), { baseDir: dir, fetcher: staticFetcher([1, 2, 3]) });

    expect(html).toContain('<img src="data:image/png;base64,AQID" alt="Stats">');
  });

  it("keeps the link when an image cannot be fetched", async () => {
    const { logger, events } = capturingLogger();

    const html = await buildRevealHtml(twoSlideDeck(), { baseDir: dir, fetcher: failingFetcher(), logger });

    expect(html).toContain('<img src="http://x/y.png" alt="Stats">');
    expect(events.map((event) => event.message)).toEqual(["Unable to fetch image", "Keeping image as a link"]);
  });

  it("inlines local images read from the base directory", async () => {
    await fs.writeFile(path.join(dir, "pic.jpg"), Buffer.from([0xff, 0xd8]));
    const deck = normalizeSlides([{ title: "Pic", layout: "caption", image_url: "pic.jpg" }]);

    const html = await buildRevealHtml(deck, { baseDir: dir, fetcher: failingFetcher() });

    expect(html).toContain(
      '<section class="caption">\n  <img src="data:image/jpeg;base64,/9g=" alt="Pic">\n  <p><em>Pic</em></p>\n</section>',
    );
  });

  it("copies local images into the assets directory when not embedding", async () => {
    await fs.writeFile(path.join(dir, "pic.jpg"), Buffer.from([0xff, 0xd8]));
    const deck = normalizeSlides([{ title: "Pic", layout: "blank", image_url: "pic.jpg" }]);

    const html = await buildRevealHtml(deck, {
      baseDir: dir,
      fetcher: failingFetcher(),
      embedImages: false,
      assetsDir: path.join(dir, "deck_assets"),
    });

    expect(html).toContain('<section data-background-image="deck_assets/pic.jpg" data-background-size="cover">');
    expect(await fs.readFile(path.join(dir, "deck_assets", "pic.jpg"))).toEqual(Buffer.from([0xff, 0xd8]));
  });

  it("escapes text and adds speaker notes", async () => {
    const deck = normalizeSlides([
      { title: "<b>&</b>", content: "- x < y\n- done", layout: "content", facilitator_notes: "Pause\nthen ask" },
    ]);

    const html = await buildRevealHtml(deck, { baseDir: dir, fetcher: failingFetcher() });

    expect(html).toContain(
      "<section>\n  <h2>&lt;b&gt;&amp;&lt;/b&gt;</h2>\n  <ul><li>x &lt; y</li><li>done</li></ul>\n  <aside class=\"notes\">Pause<br/>then ask</aside>\n</section>",
    );
    expect(html).toContain("<title>&lt;b&gt;&amp;&lt;/b&gt;</title>");
  });

  it("renders quotes, main points and big numbers", async () => {
    const deck = normalizeSlides([
      { title: "Ada", content: "Be kind", layout: "quote" },
      { title: "Listen first", layout: "main_point" },
      { title: "42%", content: "of teams", layout: "big_number" },
    ]);

    const html = await buildRevealHtml(deck, { baseDir: dir, fetcher: failingFetcher(), theme: "Moon" });

    expect(html).toContain('<section class="quote">\n  <blockquote>"Be kind"</blockquote>\n  <p><em>— Ada</em></p>\n</section>');
    expect(html).toContain('<section class="main-point">\n  <h1>Listen first</h1>\n</section>');
    expect(html).toContain(
      '<section class="big-number">\n  <div class="number">42%</div>\n  <div class="description">of teams</div>\n</section>',
    );
    expect(html).toContain("dist/theme/moon.css");
  });
});

describe("reveal helpers", () => {
  it("falls back to black for unknown themes", () => {
    const { logger, events } = capturingLogger();

    expect(resolveRevealTheme("neon", logger)).toBe("black");
    expect(resolveRevealTheme(undefined)).toBe("black");
    expect(resolveRevealTheme(" Solarized ")).toBe("solarized");
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ level: "warn", theme: "neon", fallback: "black" });
  });

  it("titles the page after the first slide", () => {
    expect(revealPageTitle([])).toBe("Untitled Presentation");
    expect(revealPageTitle(twoSlideDeck())).toBe("Intro");
    expect(revealPageTitle(twoSlideDeck(), "Workshop")).toBe("Workshop");
  });
});
