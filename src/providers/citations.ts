import type { Citation } from "../chat-types.js";

const NUMERIC_TITLE = /^\s*\d+\s*$/;
const HOST_LIKE_TITLE = /^[a-z0-9-]+(?:\.[a-z0-9-]+)+$/;
const VERTEX_HOST_SUFFIX = "vertexaisearch.cloud.google.com";
const VERTEX_PATH_HINT = "grounding-api-redirect";

export const CITATION_REDIRECT_TIMEOUT_MS = 5_000;
export const CITATION_REDIRECT_CONCURRENCY = 4;

export type RedirectFetch = (url: string, init: RequestInit) => Promise<Response>;

export type ResolveRedirectOptions = {
  fetchFn?: RedirectFetch;
  timeoutMs?: number;
  concurrency?: number;
};

function parseHttpUrl(value: string | null | undefined): URL | null {
  if (!value) {
    return null;
  }
  try {
    const parsed = new URL(value);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.host ? parsed : null;
  } catch {
    return null;
  }
}

function cleanUrl(value: string | null | undefined): string | null {
  const url = value?.trim();
  return url && parseHttpUrl(url) ? url : null;
}

function cleanTitle(value: string | null | undefined): string | null {
  const title = value?.trim();
  if (!title || NUMERIC_TITLE.test(title)) {
    return null;
  }
  return title;
}

function normalizeHost(host: string): string | null {
  let normalized = host.trim().toLowerCase();
  if (normalized.startsWith("www.")) {
    normalized = normalized.slice(4);
  }
  normalized = normalized.split(":")[0] ?? "";
  return normalized || null;
}

/** A title that only names the url's own site adds nothing. */
function isHostLikeTitleForUrl(title: string | null, url: string | null): boolean {
  const parsed = parseHttpUrl(url);
  if (!title || !parsed) {
    return false;
  }
  let candidate = title.trim().toLowerCase().replace(/\/+$/, "");
  if (candidate.startsWith("http://") || candidate.startsWith("https://")) {
    candidate = parseHttpUrl(candidate)?.host ?? "";
  }
  const titleHost = normalizeHost(candidate);
  const urlHost = normalizeHost(parsed.host);
  if (!titleHost || !urlHost || !HOST_LIKE_TITLE.test(titleHost)) {
    return false;
  }
  return titleHost === urlHost || urlHost.endsWith(`.${titleHost}`) || titleHost.endsWith(`.${urlHost}`);
}

function urlKey(url: string | null): string | null {
  const parsed = parseHttpUrl(url);
  if (!parsed) {
    return url;
  }
  parsed.hash = "";
  return parsed.toString().replace(/\/+$/, "").toLowerCase();
}

function dedupeAndNumber(citations: readonly Citation[]): Citation[] {
  const seen = new Set<string>();
  const result: Citation[] = [];
  for (const citation of citations) {
    const url = citation.url ?? null;
    const title = isHostLikeTitleForUrl(citation.title ?? null, url) ? null : (citation.title ?? null);
    const key = JSON.stringify([urlKey(url), title?.toLowerCase() ?? null]);
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push({ number: result.length + 1, title, url });
  }
  return result;
}

/** Clean titles and urls, drop duplicates and renumber from 1. */
export function normalizeCitations(citations: readonly Citation[] | null | undefined): Citation[] {
  if (!citations) {
    return [];
  }
  return dedupeAndNumber(
    citations.map((citation) => ({ title: cleanTitle(citation.title), url: cleanUrl(citation.url) })),
  );
}

export function isVertexRedirect(url: string): boolean {
  const parsed = parseHttpUrl(url);
  if (!parsed) {
    return false;
  }
  return parsed.hostname.toLowerCase().endsWith(VERTEX_HOST_SUFFIX) || parsed.pathname.toLowerCase().includes(VERTEX_PATH_HINT);
}

async function resolveRedirect(url: string, fetchFn: RedirectFetch, timeoutMs: number): Promise<string | null> {
  for (const method of ["GET", "HEAD"]) {
    let response: Response;
    try {
      response = await fetchFn(url, { method, redirect: "manual", signal: AbortSignal.timeout(timeoutMs) });
    } catch {
      // try the next method
      continue;
    }
    const location = response.headers.get("location")?.trim();
    if (!location) {
      continue;
    }
    try {
      const absolute = new URL(location, url).toString();
      if (parseHttpUrl(absolute)) {
        return absolute;
      }
    } catch {
      continue;
    }
  }
  return null;
}

/**
 * Replace grounding redirect links with their destinations. A redirect that
 * cannot be resolved loses its url; the title is kept.
 */
export async function resolveRedirectCitations(
  citations: readonly Citation[],
  options: ResolveRedirectOptions = {},
): Promise<Citation[]> {
  const fetchFn = options.fetchFn ?? fetch;
  const timeoutMs = options.timeoutMs ?? CITATION_REDIRECT_TIMEOUT_MS;
  const updated = citations.map((citation) => ({ ...citation }));
  const pending = updated.filter((citation) => citation.url && isVertexRedirect(citation.url));
  if (pending.length === 0) {
    return updated;
  }

  let next = 0;
  const worker = async () => {
    while (next < pending.length) {
      const citation = pending[next];
      next += 1;
      if (citation?.url) {
        citation.url = await resolveRedirect(citation.url, fetchFn, timeoutMs);
      }
    }
  };
  const workerCount = Math.min(pending.length, Math.max(1, options.concurrency ?? CITATION_REDIRECT_CONCURRENCY));
  await Promise.all(Array.from({ length: workerCount }, worker));
  return dedupeAndNumber(updated);
}
