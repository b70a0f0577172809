/**
 * @fileoverview Tests for the MCP tool handlers.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import { handleFetchMeme } from "../../src/tools/fetch-meme.js";
import { handleSearchMeme } from "../../src/tools/search-meme.js";
import { installFakeSite } from "../helpers/fake-site.js";

const DOGE_SITE = {
  quickResults: [{ name: "Doge", url: "/memes/doge" }],
  pages: { doge: { title: "Doge", about: "Such wow." } },
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("handleSearchMeme", () => {
  it("returns the snippet as text by default", async () => {
    installFakeSite(DOGE_SITE);

    const result = await handleSearchMeme({ query: "doge", format: "text" });

    expect(result).toEqual({
      content: [{ type: "text", text: "Doge. Such wow." }],
    });
  });

  it("returns the record as JSON when asked", async () => {
    installFakeSite(DOGE_SITE);

    const result = await handleSearchMeme({ query: "doge", format: "json" });

    expect(JSON.parse(result.content[0].text)).toEqual({
      identifier: "doge",
      url: "https://knowyourmeme.com/memes/doge",
      title: "Doge",
      description: "Such wow.",
    });
  });

  it("reports a weak match as a tool error", async () => {
    installFakeSite({
      quickResults: [{ name: "Dogecoin", url: "/memes/dogecoin" }],
    });

    const result = await handleSearchMeme({
      query: "doge",
      threshold: 0.9,
      format: "text",
    });

    expect(result).toEqual({
      content: [
        {
          type: "text",
          text: '[NO_CONFIDENT_MATCH] No confident match for "doge": best was "Dogecoin" (0.667 < 0.900)',
        },
      ],
      isError: true,
    });
  });
});

describe("handleFetchMeme", () => {
  it("returns the snippet for a slug", async () => {
    installFakeSite(DOGE_SITE);

    const result = await handleFetchMeme({ input: "doge", format: "text" });

    expect(result.content[0].text).toBe("Doge. Such wow.");
  });

  it("reports an unsupported URL with its error code", async () => {
    const fetchMock = installFakeSite(DOGE_SITE);

    const result = await handleFetchMeme({
      input: "https://knowyourmeme.com/videos/123",
      format: "text",
    });

    expect(result).toEqual({
      content: [
        {
          type: "text",
          text: "[UNSUPPORTED_URL_KIND] Unsupported URL: https://knowyourmeme.com/videos/123 (expected a meme page like https://knowyourmeme.com/memes/<slug>)",
        },
      ],
      isError: true,
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
