/**
 * @fileoverview Tests for search ranking, selection and end-to-end resolution.
 */

import { afterEach, describe, it, expect, vi } from "vitest";
import {
  rankCandidates,
  resolveSearch,
  selectBestCandidate,
} from "../../src/search/resolver.js";
import {
  EmptyQueryError,
  MalformedResponseError,
  NoConfidentMatchError,
  NoResultsError,
  StructureNotFoundError,
} from "../../src/utils/errors.js";
import { installFakeSite } from "../helpers/fake-site.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// rankCandidates
// ---------------------------------------------------------------------------

describe("rankCandidates", () => {
  it("scores each candidate and records its backend position", () => {
    const ranked = rankCandidates("ab", [
      { label: "abcdef", identifier: "first" },
      { label: "AB", identifier: "second" },
    ]);
    expect(ranked).toEqual([
      { label: "abcdef", identifier: "first", score: 0.5, position: 0 },
      { label: "AB", identifier: "second", score: 1, position: 1 },
    ]);
  });
});

// ---------------------------------------------------------------------------
// selectBestCandidate
// ---------------------------------------------------------------------------

describe("selectBestCandidate", () => {
  it("picks the highest score", () => {
    const ranked = rankCandidates("doge", [
      { label: "Dogecoin", identifier: "dogecoin" },
      { label: "Doge", identifier: "doge" },
    ]);
    expect(selectBestCandidate("doge", ranked, 0.5).identifier).toBe("doge");
  });

  it("prefers the earliest candidate among equal top scores", () => {
    const ranked = rankCandidates("doge", [
      { label: "Doge", identifier: "doge-original" },
      { label: "DOGE", identifier: "doge-shouting" },
    ]);
    expect(selectBestCandidate("doge", ranked, 0.5).identifier).toBe(
      "doge-original",
    );
  });

  it("accepts a best score exactly at the threshold", () => {
    const ranked = rankCandidates("ab", [{ label: "abcdef", identifier: "x" }]);
    expect(selectBestCandidate("ab", ranked, 0.5).identifier).toBe("x");
  });

  it("rejects a best score just below the threshold", () => {
    // 4 / 9
    const ranked = rankCandidates("ab", [{ label: "abcdefg", identifier: "x" }]);
    try {
      selectBestCandidate("ab", ranked, 0.5);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(NoConfidentMatchError);
      if (error instanceof NoConfidentMatchError) {
        expect(error.bestLabel).toBe("abcdefg");
        expect(error.bestScore).toBe(4 / 9);
        expect(error.threshold).toBe(0.5);
        expect(error.message).toBe(
          'No confident match for "ab": best was "abcdefg" (0.444 < 0.500)',
        );
      }
    }
  });

  it("throws NoResultsError for an empty list", () => {
    expect(() => selectBestCandidate("doge", [], 0.5)).toThrow(NoResultsError);
  });
});

// ---------------------------------------------------------------------------
// resolveSearch
// ---------------------------------------------------------------------------

describe("resolveSearch", () => {
  it("resolves a prefix query to the matching page", async () => {
    const fetchMock = installFakeSite({
      quickResults: [
        { name: "All Your Base Are Belong To Us", url: "/memes/all-your-base-are-belong-to-us" },
      ],
      pages: {
        "all-your-base-are-belong-to-us": {
          title: "All Your Base Are Belong To Us",
          about: "A broken English phrase from Zero Wing.",
        },
      },
    });

    const record = await resolveSearch("all your base");

    expect(record).toEqual({
      identifier: "all-your-base-are-belong-to-us",
      url: "https://knowyourmeme.com/memes/all-your-base-are-belong-to-us",
      title: "All Your Base Are Belong To Us",
      description: "A broken English phrase from Zero Wing.",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("sends the trimmed query to the backend", async () => {
    const fetchMock = installFakeSite({
      quickResults: [{ name: "Doge", url: "/memes/doge" }],
      pages: { doge: { title: "Doge", about: "Such wow." } },
    });

    await resolveSearch("   doge  ");

    const requested = new URL(fetchMock.mock.calls[0][0]);
    expect(requested.searchParams.get("query")).toBe("doge");
  });

  it("fetches the best-scoring candidate, not the backend's first", async () => {
    installFakeSite({
      quickResults: [
        { name: "Dogecoin", url: "/memes/dogecoin" },
        { name: "Doge", url: "/memes/doge" },
      ],
      pages: {
        dogecoin: { title: "Dogecoin", about: "A currency." },
        doge: { title: "Doge", about: "Such wow." },
      },
    });

    const record = await resolveSearch("doge");
    expect(record.identifier).toBe("doge");
  });

  it("takes the backend's first result when the threshold is disabled", async () => {
    installFakeSite({
      quickResults: [
        { name: "Zero Wing", url: "/memes/zero-wing" },
        { name: "Doge", url: "/memes/doge" },
      ],
      pages: {
        "zero-wing": { title: "Zero Wing", about: "A game." },
        doge: { title: "Doge", about: "Such wow." },
      },
    });

    const record = await resolveSearch("doge", { threshold: null });
    expect(record.identifier).toBe("zero-wing");
  });

  it("honors a per-call threshold", async () => {
    installFakeSite({
      quickResults: [{ name: "Dogecoin", url: "/memes/dogecoin" }],
      pages: { dogecoin: { title: "Dogecoin", about: "A currency." } },
    });

    // 8 / 12 is below 0.9
    await expect(resolveSearch("doge", { threshold: 0.9 })).rejects.toBeInstanceOf(
      NoConfidentMatchError,
    );
  });

  it("fails with NoConfidentMatch after one request when nothing is close", async () => {
    const fetchMock = installFakeSite({
      quickResults: [{ name: "Trollface", url: "/memes/trollface" }],
    });

    await expect(resolveSearch("all your base")).rejects.toBeInstanceOf(
      NoConfidentMatchError,
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("fails with NoResults when the backend returns nothing", async () => {
    installFakeSite({ quickResults: [] });

    await expect(resolveSearch("zzzz")).rejects.toBeInstanceOf(NoResultsError);
  });

  it("fails with NoResults when no entry is a meme page", async () => {
    installFakeSite({
      quickResults: [{ name: "Keanu Reeves", url: "/memes/people/keanu-reeves" }],
    });

    await expect(resolveSearch("keanu reeves")).rejects.toBeInstanceOf(NoResultsError);
  });

  it("fails with MalformedResponse for an unexpected payload", async () => {
    installFakeSite({ quickResults: '{"error":"index not found"}' });

    await expect(resolveSearch("doge")).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it("propagates extraction failures from the winning page", async () => {
    const fetchMock = installFakeSite({
      quickResults: [{ name: "Doge", url: "/memes/doge" }],
    });
    fetchMock.mockImplementationOnce(
      async () =>
        new Response(JSON.stringify({ results: [{ name: "Doge", url: "/memes/doge" }] }), {
          status: 200,
          headers: { "content-type": "application/json" },
        }),
    );
    fetchMock.mockImplementationOnce(
      async () =>
        new Response("<html><body><p>redesigned</p></body></html>", {
          status: 200,
          headers: { "content-type": "text/html" },
        }),
    );

    await expect(resolveSearch("doge")).rejects.toBeInstanceOf(StructureNotFoundError);
  });

  it("rejects a blank query without issuing a request", async () => {
    const fetchMock = installFakeSite({});

    await expect(resolveSearch("  \t ")).rejects.toBeInstanceOf(EmptyQueryError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("rejects an out-of-range threshold without issuing a request", async () => {
    const fetchMock = installFakeSite({});

    await expect(resolveSearch("doge", { threshold: 1.5 })).rejects.toBeInstanceOf(
      RangeError,
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
