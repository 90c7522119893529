import { describe, expect, it } from "vitest";
import { isVertexRedirect, normalizeCitations, resolveRedirectCitations, type RedirectFetch } from "./citations.js";

const REDIRECT = "https://vertexaisearch.cloud.google.com/grounding-api-redirect";

function redirectTo(location: string): Response {
  return new Response(null, { status: 302, headers: { location } });
}

describe("normalizeCitations", () => {
  it("cleans titles and urls, drops duplicates and renumbers", () => {
    expect(
      normalizeCitations([
        { number: 5, title: " 1 ", url: "https://example.com/a#intro" },
        { title: "Guide", url: "https://example.com/a" },
        { title: "example.com", url: "https://www.example.com/b" },
        { title: "Docs", url: "ftp://example.com/file" },
        { title: "Dup", url: "https://example.com/c/" },
        { title: "dup", url: "https://example.com/c" },
      ]),
    ).toEqual([
      { number: 1, title: null, url: "https://example.com/a#intro" },
      { number: 2, title: "Guide", url: "https://example.com/a" },
      { number: 3, title: null, url: "https://www.example.com/b" },
      { number: 4, title: "Docs", url: null },
      { number: 5, title: "Dup", url: "https://example.com/c/" },
    ]);
    expect(normalizeCitations(undefined)).toEqual([]);
  });
});

describe("isVertexRedirect", () => {
  it("matches the grounding host or path", () => {
    expect(isVertexRedirect(`${REDIRECT}/abc`)).toBe(true);
    expect(isVertexRedirect("https://example.com/grounding-api-redirect/x")).toBe(true);
    expect(isVertexRedirect("https://example.com/page")).toBe(false);
    expect(isVertexRedirect("not a url")).toBe(false);
  });
});

describe("resolveRedirectCitations", () => {
  it("follows the location header and drops links it cannot resolve", async () => {
    const calls: string[] = [];
    const fetchFn: RedirectFetch = async (url, init) => {
      calls.push(`${init.method ?? ""} ${url} ${init.redirect ?? ""}`);
      if (url.endsWith("/aaa")) {
        return redirectTo("https://example.com/guide");
      }
      if (init.method === "GET") {
        throw new Error("connection reset");
      }
      return new Response(null, { status: 200 });
    };

    const resolved = await resolveRedirectCitations(
      [
        { number: 1, title: "Guide", url: `${REDIRECT}/aaa` },
        { number: 2, title: "Other", url: `${REDIRECT}/bbb` },
        { number: 3, title: "Plain", url: "https://example.org/plain" },
      ],
      { fetchFn },
    );

    expect(resolved).toEqual([
      { number: 1, title: "Guide", url: "https://example.com/guide" },
      { number: 2, title: "Other", url: null },
      { number: 3, title: "Plain", url: "https://example.org/plain" },
    ]);
    expect(calls.sort()).toEqual([
      `GET ${REDIRECT}/aaa manual`,
      `GET ${REDIRECT}/bbb manual`,
      `HEAD ${REDIRECT}/bbb manual`,
    ]);
  });

  it("merges redirects that land on the same page", async () => {
    const fetchFn: RedirectFetch = async () => redirectTo("https://example.com/guide");

    await expect(
      resolveRedirectCitations(
        [
          { number: 1, title: "Guide", url: `${REDIRECT}/aaa` },
          { number: 2, title: "Guide", url: `${REDIRECT}/bbb` },
        ],
        { fetchFn },
      ),
    ).resolves.toEqual([{ number: 1, title: "Guide", url: "https://example.com/guide" }]);
  });

  it("keeps at most `concurrency` requests in flight", async () => {
    let inFlight = 0;
    let peak = 0;
    const fetchFn: RedirectFetch = async (url) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight -= 1;
      return redirectTo(url.replace(REDIRECT, "https://example.com"));
    };

    const resolved = await resolveRedirectCitations(
      ["a", "b", "c", "d", "e"].map((name, index) => ({ number: index + 1, title: name, url: `${REDIRECT}/${name}` })),
      { fetchFn, concurrency: 2 },
    );

    expect(peak).toBe(2);
    expect(resolved.map((citation) => citation.url)).toEqual([
      "https://example.com/a",
      "https://example.com/b",
      "https://example.com/c",
      "https://example.com/d",
      "https://example.com/e",
    ]);
  });
});
