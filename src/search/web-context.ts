import { createLogger } from "../log";
import { errorMessage } from "../../llm/errors";

const log = createLogger("search");

const SEARCH_URL = "https://html.duckduckgo.com/html/";
const USER_AGENT = "Mozilla/5.0 (compatible; searchshell)";
const MAX_CONTENT_CHARS = 2000;
const ENTRY_RULE = "=".repeat(50);
const REMOVED_ELEMENTS = ["script", "style", "nav", "header", "footer", "iframe", "noscript"];

/** Source of reference text spliced into a turn as a system message. */
export interface ReferenceProvider {
  fetchContext(query: string, maxResults: number, signal?: AbortSignal): Promise<string>;
}

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

export const decodeHtml = (value: string): string => value
  .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(Number(code)))
  .replace(/&#x([0-9a-f]+);/gi, (_, code: string) => String.fromCharCode(parseInt(code, 16)))
  .replace(/&quot;/g, "\"")
  .replace(/&#x27;/g, "'")
  .replace(/&lt;/g, "<")
  .replace(/&gt;/g, ">")
  .replace(/&nbsp;/g, " ")
  .replace(/&amp;/g, "&");

export const stripHtml = (value: string): string =>
  decodeHtml(value.replace(/<[^>]+>/g, " ")).replace(/\s+/g, " ").trim();

export const resolveDuckDuckGoRedirect = (href: string): string => {
  try {
    const parsed = new URL(href, "https://duckduckgo.com");
    const uddg = parsed.searchParams.get("uddg");
    return uddg ? decodeURIComponent(uddg) : parsed.toString();
  } catch {
    return href;
  }
};

export function parseSearchResults(html: string, limit: number): SearchResult[] {
  const titleMatches = [...html.matchAll(/<a[^>]*class="result__a"[^>]*href="([^"]+)"[^>]*>([\s\S]*?)<\/a>/gi)];
  const snippetMatches = [...html.matchAll(/<a[^>]*class="result__snippet"[^>]*>([\s\S]*?)<\/a>|<div[^>]*class="result__snippet"[^>]*>([\s\S]*?)<\/div>/gi)];
  const out: SearchResult[] = [];

  for (let i = 0; i < titleMatches.length && out.length < limit; i++) {
    const href = titleMatches[i]?.[1] || "";
    const rawTitle = titleMatches[i]?.[2] || "";
    const rawSnippet = snippetMatches[i]?.[1] || snippetMatches[i]?.[2] || "";
    const title = stripHtml(rawTitle);
    const url = resolveDuckDuckGoRedirect(decodeHtml(href));
    if (!title || !url) continue;
    out.push({ title, snippet: stripHtml(rawSnippet) || title, url });
  }
  return out;
}

export function extractTitle(html: string): string | undefined {
  const match = html.match(/<title\b[^>]*>([\s\S]*?)<\/title>/i);
  const title = match ? stripHtml(match[1] ?? "") : "";
  return title || undefined;
}

function pickMainFragment(html: string): string {
  const candidates = [
    /<main\b[^>]*>([\s\S]*?)<\/main>/i,
    /<article\b[^>]*>([\s\S]*?)<\/article>/i,
    /<div\b[^>]*class="[^"]*\b(?:content|main|article)\b[^"]*"[^>]*>([\s\S]*?)<\/div>/i,
    /<body\b[^>]*>([\s\S]*?)<\/body>/i,
  ];
  for (const pattern of candidates) {
    const match = html.match(pattern);
    if (match?.[1] !== undefined) return match[1];
  }
  return html;
}

/** Readable text of a page: main region first, one line per text node, capped. */
export function extractMainContent(html: string, maxChars = MAX_CONTENT_CHARS): string {
  let cleaned = html.replace(/<!--[\s\S]*?-->/g, " ");
  for (const tag of REMOVED_ELEMENTS) {
    cleaned = cleaned.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}>`, "gi"), "\n");
  }
  const text = decodeHtml(pickMainFragment(cleaned).replace(/<[^>]+>/g, "\n"));
  const lines = text
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0);
  return lines.join("\n").slice(0, maxChars);
}

export function formatContextEntry(entry: { title: string; url: string; content?: string }): string {
  if (entry.content) {
    return `Source: ${entry.title}\nURL: ${entry.url}\n\nContent:\n${entry.content}\n${ENTRY_RULE}\n`;
  }
  return `Source: ${entry.title}\nURL: ${entry.url}\n${ENTRY_RULE}\n`;
}

export interface WebContextOptions {
  fetch?: typeof fetch;
  pageTimeoutMs?: number;
  searchTimeoutMs?: number;
  onProgress?: (message: string) => void;
}

/**
 * Searches DuckDuckGo's HTML endpoint and turns the top pages into one block
 * of reference text. Failures never throw: a failed search gives "", a failed
 * page gives an entry without content. Aborting `signal` rejects instead.
 */
export class WebContextProvider implements ReferenceProvider {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: WebContextOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  private requestSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchResult[]> {
    const url = new URL(SEARCH_URL);
    url.searchParams.set("q", query);
    try {
      const response = await this.fetchImpl(url.toString(), {
        headers: { Accept: "text/html", "User-Agent": USER_AGENT },
        signal: this.requestSignal(this.options.searchTimeoutMs ?? 10_000, signal),
      });
      if (!response.ok) {
        log.warn(`Search failed with status ${response.status}`);
        return [];
      }
      return parseSearchResults(await response.text(), Math.max(1, limit));
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn(`Error searching web: ${errorMessage(error)}`);
      return [];
    }
  }

  private async fetchPage(url: string, signal?: AbortSignal): Promise<string | undefined> {
    try {
      const response = await this.fetchImpl(url, {
        headers: { Accept: "text/html", "User-Agent": USER_AGENT },
        signal: this.requestSignal(this.options.pageTimeoutMs ?? 10_000, signal),
      });
      if (!response.ok) {
        log.debug(`Page ${url} answered ${response.status}`);
        return undefined;
      }
      return await response.text();
    } catch (error) {
      if (signal?.aborted) throw error;
      log.warn(`Error extracting content from ${url}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  async fetchContext(query: string, maxResults: number, signal?: AbortSignal): Promise<string> {
    signal?.throwIfAborted();
    const results = await this.search(query, maxResults, signal);
    const entries: string[] = [];

    for (const result of results) {
      signal?.throwIfAborted();
      this.options.onProgress?.(`Fetching content from: ${result.url}`);
      const html = await this.fetchPage(result.url, signal);
      const title = (html && extractTitle(html)) || result.title || result.url;
      const content = html ? extractMainContent(html) : "";
      entries.push(formatContextEntry({ title, url: result.url, content }));
    }

    return entries.join("\n");
  }
}
