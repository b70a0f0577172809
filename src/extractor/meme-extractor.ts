/**
 * @fileoverview Field extraction for meme detail pages.
 *
 * A detail page carries far more than we want (ads, navigation, comment
 * threads, galleries). Extraction is scoped to two regions, located by a
 * fixed structural signature, and everything else in the document is ignored.
 *
 * **Title**: the primary heading, tried in order:
 *   1. `h1.entry-title`
 *   2. the first `h1` inside `#entry_body`, `main` or `article`
 *
 *   Decorations inside the heading (category badges, labels, `<small>`) are
 *   removed and the remaining text nodes are joined with single spaces.
 *
 * **Description**: the "About" section:
 *   - `#about` is a heading: the `<p>` siblings that follow it, up to the next
 *     heading or the next element carrying an `id` (the next section anchor).
 *   - `#about` is a container: every `<p>` inside it.
 *   - no usable `#about`: the first `<p>` inside `#entry_body`.
 *
 *   Citation markers (`<sup>`, `[1]`), edit links and embedded markup are
 *   dropped and whitespace is collapsed.
 *
 * Either region missing means the site's markup no longer matches this
 * signature, and extraction throws {@link StructureNotFoundError} instead of
 * returning a record with an empty field.
 *
 * @module extractor/meme-extractor
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { hasChildren, isText } from "domhandler";
import type { AnyNode } from "domhandler";
import { buildMemeUrl } from "../utils/url.js";
import { StructureNotFoundError } from "../utils/errors.js";

// ---------------------------------------------------------------------------
// Public Types
// ---------------------------------------------------------------------------

/**
 * One resolved meme entry.
 *
 * Records are frozen: callers own them, and nothing in this package keeps a
 * reference after returning one.
 *
 * @example
 * ```typescript
 * const record = extractMeme(html, "mocking-spongebob");
 * record.title;       // "Mocking SpongeBob"
 * record.description; // "Mocking SpongeBob is an image macro ..."
 * ```
 */
export interface MemeRecord {
  /** Canonical, path-safe slug of the page. */
  readonly identifier: string;

  /** Canonical detail-page URL built from {@link identifier}. */
  readonly url: string;

  /** Heading text, decorations removed. */
  readonly title: string;

  /** Plain text of the About section. */
  readonly description: string;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Heading signatures, most specific first. */
const TITLE_SELECTORS: readonly string[] = [
  "h1.entry-title",
  "#entry_body h1",
  "main h1",
  "article h1",
] as const;

/** Elements inside the heading that are labels rather than title text. */
const TITLE_DECORATIONS =
  "small, .label, .entry-category, [class*='badge'], script, style";

/** Elements inside About paragraphs that never belong to the prose. */
const DESCRIPTION_NOISE =
  "sup, script, style, noscript, .edit-link, .edit-section, a[href*='/edit']";

/** Bracketed markers left in the text after tag removal. */
const INLINE_MARKERS = /\[(?:\d+|citation needed|edit)\]/gi;

const HEADINGS = "h1, h2, h3, h4, h5, h6";

/** Siblings that open the next section after `#about`. */
const SECTION_BOUNDARY = `${HEADINGS}, [id]`;

// ---------------------------------------------------------------------------
// Internal Helpers
// ---------------------------------------------------------------------------

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Trimmed, non-empty text nodes in document order. */
function collectStrings(nodes: readonly AnyNode[], out: string[]): string[] {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) {
        out.push(text);
      }
    } else if (hasChildren(node)) {
      collectStrings(node.children, out);
    }
  }
  return out;
}

function extractTitle($: CheerioAPI): string | null {
  for (const selector of TITLE_SELECTORS) {
    const heading = $(selector).first();
    if (heading.length === 0) {
      continue;
    }

    const clone = heading.clone();
    clone.find(TITLE_DECORATIONS).remove();

    const title = normalizeWhitespace(collectStrings(clone.toArray(), []).join(" "));
    if (title) {
      return title;
    }
  }
  return null;
}

function paragraphText($: CheerioAPI, paragraph: AnyNode): string {
  const clone = $(paragraph).clone();
  clone.find(DESCRIPTION_NOISE).remove();
  // line breaks separate words once the markup is gone
  clone.find("br").replaceWith(" ");
  return normalizeWhitespace(clone.text().replace(INLINE_MARKERS, ""));
}

function joinParagraphs($: CheerioAPI, paragraphs: readonly AnyNode[]): string {
  return paragraphs
    .map((paragraph) => paragraphText($, paragraph))
    .filter(Boolean)
    .join(" ");
}

function extractAbout($: CheerioAPI): string | null {
  const anchor = $("#about").first();

  if (anchor.length > 0) {
    const paragraphs: AnyNode[] = [];

    if (anchor.is(HEADINGS)) {
      let sibling = anchor.next();
      while (sibling.length > 0 && !sibling.is(SECTION_BOUNDARY)) {
        if (sibling.is("p")) {
          paragraphs.push(...sibling.toArray());
        }
        sibling = sibling.next();
      }
    } else {
      paragraphs.push(...anchor.find("p").toArray());
    }

    const about = joinParagraphs($, paragraphs);
    if (about) {
      return about;
    }
  }

  const fallback = joinParagraphs($, $("#entry_body p").first().toArray());
  return fallback || null;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Extract a {@link MemeRecord} from the raw markup of a detail page.
 *
 * Pure and synchronous: no I/O, no shared state.
 *
 * @param html       - Raw page markup.
 * @param identifier - Slug the page was fetched with.
 *
 * @throws {StructureNotFoundError} If the heading (`region: "title"`) or the
 *   About block (`region: "about"`) cannot be found or is empty.
 *
 * @example
 * ```typescript
 * extractMeme(
 *   '<h1 class="entry-title">Doge</h1><h2 id="about">About</h2><p>Such wow.</p>',
 *   "doge",
 * );
 * // => { identifier: "doge", url: "https://knowyourmeme.com/memes/doge",
 * //      title: "Doge", description: "Such wow." }
 * ```
 */
export function extractMeme(html: string, identifier: string): MemeRecord {
  const $ = cheerio.load(html);

  const title = extractTitle($);
  if (title === null) {
    throw new StructureNotFoundError(
      `No title heading found on the page for "${identifier}"`,
      "title",
    );
  }

  const description = extractAbout($);
  if (description === null) {
    throw new StructureNotFoundError(
      `No "About" section found on the page for "${identifier}"`,
      "about",
    );
  }

  return Object.freeze({
    identifier,
    url: buildMemeUrl(identifier),
    title,
    description,
  });
}
