/**
 * @fileoverview Tests for meme detail-page field extraction.
 *
 * Covers: title signatures and decorations, About section boundaries,
 * description cleaning, the #entry_body fallback, and StructureNotFound.
 */

import { describe, it, expect } from "vitest";
import { extractMeme } from "../../src/extractor/meme-extractor.js";
import { StructureNotFoundError } from "../../src/utils/errors.js";

/** Wraps body markup in a page with the surrounding chrome a real page has. */
function page(body: string): string {
  return `
    <!DOCTYPE html>
    <html>
      <head><title>Page | Meme Site</title></head>
      <body>
        <nav><h1>Meme Site</h1><a href="/memes">Memes</a></nav>
        <div class="ad"><p>Buy things!</p></div>
        ${body}
        <footer><p>Copyright</p></footer>
      </body>
    </html>
  `;
}

// ---------------------------------------------------------------------------
// extractMeme: well-formed pages
// ---------------------------------------------------------------------------

describe("extractMeme: well-formed detail page", () => {
  const html = page(`
    <article class="entry">
      <header>
        <h1 class="entry-title">
          All Your Base Are Belong To Us
        </h1>
      </header>
      <div id="entry_body">
        <section class="bodycopy">
          <h2 id="about">About</h2>
          <p>All Your Base Are Belong To Us is a <a href="/memes/engrish">broken English</a> phrase.</p>
          <p>It comes from a 1989 video game.</p>
          <h2 id="origin">Origin</h2>
          <p>The opening cutscene of Zero Wing.</p>
        </section>
      </div>
      <div id="comments"><p>first!</p></div>
    </article>
  `);

  it("returns the identifier and canonical URL", () => {
    const record = extractMeme(html, "all-your-base-are-belong-to-us");
    expect(record.identifier).toBe("all-your-base-are-belong-to-us");
    expect(record.url).toBe(
      "https://knowyourmeme.com/memes/all-your-base-are-belong-to-us",
    );
  });

  it("extracts the trimmed heading text as the title", () => {
    const record = extractMeme(html, "all-your-base-are-belong-to-us");
    expect(record.title).toBe("All Your Base Are Belong To Us");
  });

  it("joins the About paragraphs and stops at the next section", () => {
    const record = extractMeme(html, "all-your-base-are-belong-to-us");
    expect(record.description).toBe(
      "All Your Base Are Belong To Us is a broken English phrase. " +
        "It comes from a 1989 video game.",
    );
  });

  it("returns a frozen record", () => {
    const record = extractMeme(html, "all-your-base-are-belong-to-us");
    expect(Object.isFrozen(record)).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// extractMeme: title handling
// ---------------------------------------------------------------------------

describe("extractMeme: title", () => {
  const about = `<h2 id="about">About</h2><p>Text.</p>`;

  it("removes category badges and labels from the heading", () => {
    const html = page(`
      <h1 class="entry-title">Doge <span class="entry-category-badge">Meme</span><small>Updated</small></h1>
      ${about}
    `);
    expect(extractMeme(html, "doge").title).toBe("Doge");
  });

  it("joins nested text nodes with single spaces", () => {
    const html = page(`
      <h1 class="entry-title"><span>Mocking</span><span>SpongeBob</span></h1>
      ${about}
    `);
    expect(extractMeme(html, "mocking-spongebob").title).toBe("Mocking SpongeBob");
  });

  it("falls back to the first h1 inside main content", () => {
    const html = page(`
      <main><h1>Trollface</h1>${about}</main>
    `);
    expect(extractMeme(html, "trollface").title).toBe("Trollface");
  });

  it("ignores headings outside the content regions", () => {
    const html = page(about);
    expect(() => extractMeme(html, "nav-only")).toThrow(StructureNotFoundError);
  });

  it("treats a heading with only decorations as missing", () => {
    const html = page(`
      <h1 class="entry-title"><span class="badge">Meme</span></h1>
      ${about}
    `);
    try {
      extractMeme(html, "empty-title");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StructureNotFoundError);
      if (error instanceof StructureNotFoundError) {
        expect(error.region).toBe("title");
        expect(error.code).toBe("STRUCTURE_NOT_FOUND");
      }
    }
  });
});

// ---------------------------------------------------------------------------
// extractMeme: description handling
// ---------------------------------------------------------------------------

describe("extractMeme: description", () => {
  const title = `<h1 class="entry-title">Doge</h1>`;

  it("removes citation markers and edit links", () => {
    const html = page(`
      ${title}
      <h2 id="about">About <a class="edit-link" href="/memes/doge/edit">edit</a></h2>
      <p>Doge is a Shiba Inu.<sup>[1]</sup> Such wow. [2]</p>
      <p>Very meme. <a href="/memes/doge/edit">[edit]</a></p>
    `);
    expect(extractMeme(html, "doge").description).toBe(
      "Doge is a Shiba Inu. Such wow. Very meme.",
    );
  });

  it("collapses internal whitespace", () => {
    const html = page(`
      ${title}
      <h2 id="about">About</h2>
      <p>Doge
         is   a
         Shiba Inu.</p>
    `);
    expect(extractMeme(html, "doge").description).toBe("Doge is a Shiba Inu.");
  });

  it("keeps words apart across line breaks", () => {
    const html = page(`
      ${title}
      <h2 id="about">About</h2>
      <p>Such wow.<br>Very meme.<br/>Much<br>doge.</p>
    `);
    expect(extractMeme(html, "doge").description).toBe(
      "Such wow. Very meme. Much doge.",
    );
  });

  it("stops at the next element carrying an id", () => {
    const html = page(`
      ${title}
      <h2 id="about">About</h2>
      <p>First.</p>
      <div id="gallery"></div>
      <p>Not about.</p>
    `);
    expect(extractMeme(html, "doge").description).toBe("First.");
  });

  it("skips non-paragraph siblings inside the section", () => {
    const html = page(`
      ${title}
      <h2 id="about">About</h2>
      <p>First.</p>
      <center><img src="/doge.png"></center>
      <p>Second.</p>
      <h2>Spread</h2>
      <p>Elsewhere.</p>
    `);
    expect(extractMeme(html, "doge").description).toBe("First. Second.");
  });

  it("reads paragraphs inside an #about container", () => {
    const html = page(`
      ${title}
      <section id="about"><h2>About</h2><p>Inside.</p><p>Also inside.</p></section>
    `);
    expect(extractMeme(html, "doge").description).toBe("Inside. Also inside.");
  });

  it("falls back to the first #entry_body paragraph without an About section", () => {
    const html = page(`
      ${title}
      <div id="entry_body"><p>Lead paragraph.</p><p>Second paragraph.</p></div>
    `);
    expect(extractMeme(html, "doge").description).toBe("Lead paragraph.");
  });

  it("ignores comments, scripts and ads around the About block", () => {
    const html = page(`
      ${title}
      <h2 id="about">About</h2>
      <!-- ad slot -->
      <p>Real text.<script>track()</script></p>
    `);
    expect(extractMeme(html, "doge").description).toBe("Real text.");
  });

  it("throws StructureNotFound for the about region when it is missing", () => {
    const html = page(`${title}<div class="sidebar"><p>Related</p></div>`);
    try {
      extractMeme(html, "doge");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(StructureNotFoundError);
      if (error instanceof StructureNotFoundError) {
        expect(error.region).toBe("about");
      }
    }
  });

  it("throws StructureNotFound when the About section has no text", () => {
    const html = page(`${title}<h2 id="about">About</h2><h2 id="origin">Origin</h2><p>x</p>`);
    expect(() => extractMeme(html, "doge")).toThrow(StructureNotFoundError);
  });

  it("throws for an empty document", () => {
    expect(() => extractMeme("", "doge")).toThrow(StructureNotFoundError);
  });
});
