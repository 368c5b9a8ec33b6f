import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  WebContextProvider,
  extractMainContent,
  extractTitle,
  formatContextEntry,
  parseSearchResults,
  resolveDuckDuckGoRedirect,
} from "../src/search/web-context";
import { fakeFetch } from "./helpers";

const RULE = "=".repeat(50);

function resultHtml(target: string, title: string, snippet: string): string {
  return `<div class="result"><h2><a rel="nofollow" class="result__a" href="//duckduckgo.com/l/?uddg=${encodeURIComponent(target)}&amp;rut=abc">${title}</a></h2>
<a class="result__snippet" href="//duckduckgo.com/l/?uddg=${encodeURIComponent(target)}">${snippet}</a></div>`;
}

const SEARCH_HTML = `<html><body>
${resultHtml("https://example.test/paris", "Paris &amp; weather", "Sunny <b>spells</b>")}
${resultHtml("https://example.test/lyon", "Lyon weather", "Cloudy")}
</body></html>`;

const PARIS_PAGE = `<html><head><title>Paris forecast</title><style>.x { color: red; }</style></head>
<body><nav>Menu</nav><!-- ad slot --><main><h1>Today</h1><p>Sunny &amp; warm</p><script>var a = 1;</script>
<p>  High   of 25  </p></main><footer>Footer</footer></body></html>`;

describe("parseSearchResults", () => {
  it("reads titles, snippets and unwrapped result urls", () => {
    expect(parseSearchResults(SEARCH_HTML, 5)).toEqual([
      { title: "Paris & weather", snippet: "Sunny spells", url: "https://example.test/paris" },
      { title: "Lyon weather", snippet: "Cloudy", url: "https://example.test/lyon" },
    ]);
  });

  it("stops at the limit", () => {
    expect(parseSearchResults(SEARCH_HTML, 1)).toHaveLength(1);
  });

  it("leaves direct links as they are", () => {
    expect(resolveDuckDuckGoRedirect("https://example.test/page?id=1")).toBe("https://example.test/page?id=1");
  });
});

describe("extractMainContent", () => {
  it("keeps the main region as one line per text run", () => {
    expect(extractMainContent(PARIS_PAGE)).toBe("Today\nSunny & warm\nHigh of 25");
  });

  it("falls back to article, content divs and then the body", () => {
    expect(extractMainContent("<body><nav>x</nav><article><p>Story</p></article></body>")).toBe("Story");
    expect(extractMainContent('<body><div class="page content"><p>Inner</p></div><p>Other</p></body>')).toBe("Inner");
    expect(extractMainContent("<body><header>Top</header><p>Body text</p></body>")).toBe("Body text");
  });

  it("caps the extracted text", () => {
    expect(extractMainContent(`<body>${"a".repeat(3000)}</body>`)).toHaveLength(2000);
    expect(extractMainContent("<body>abcdef</body>", 3)).toBe("abc");
  });

  it("reads the page title", () => {
    expect(extractTitle(PARIS_PAGE)).toBe("Paris forecast");
    expect(extractTitle("<p>no title</p>")).toBeUndefined();
  });
});

describe("formatContextEntry", () => {
  it("includes content only when there is some", () => {
    expect(formatContextEntry({ title: "T", url: "https://example.test", content: "Body" })).toBe(
      `Source: T\nURL: https://example.test\n\nContent:\nBody\n${RULE}\n`,
    );
    expect(formatContextEntry({ title: "T", url: "https://example.test", content: "" })).toBe(
      `Source: T\nURL: https://example.test\n${RULE}\n`,
    );
  });
});

describe("WebContextProvider", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("turns the top results into one reference block", async () => {
    const fake = fakeFetch((url) => {
      if (url.startsWith("https://html.duckduckgo.com/html/")) return new Response(SEARCH_HTML);
      if (url === "https://example.test/paris") return new Response(PARIS_PAGE);
      return new Response("gone", { status: 404 });
    });
    const progress: string[] = [];
    const provider = new WebContextProvider({ fetch: fake.fetch, onProgress: (message) => progress.push(message) });

    const context = await provider.fetchContext("weather in Paris", 2);

    expect(fake.requests[0]?.url).toBe("https://html.duckduckgo.com/html/?q=weather+in+Paris");
    expect(progress).toEqual([
      "Fetching content from: https://example.test/paris",
      "Fetching content from: https://example.test/lyon",
    ]);
    expect(context).toBe(
      `Source: Paris forecast\nURL: https://example.test/paris\n\nContent:\nToday\nSunny & warm\nHigh of 25\n${RULE}\n`
        + "\n"
        + `Source: Lyon weather\nURL: https://example.test/lyon\n${RULE}\n`,
    );
  });

  it("keeps an entry without content when a page cannot be fetched", async () => {
    const fake = fakeFetch((url) => {
      if (url.startsWith("https://html.duckduckgo.com/html/")) return new Response(SEARCH_HTML);
      throw new Error("connection reset");
    });
    const provider = new WebContextProvider({ fetch: fake.fetch });

    expect(await provider.fetchContext("weather", 1)).toBe(`Source: Paris & weather\nURL: https://example.test/paris\n${RULE}\n`);
  });

  it("stops fetching pages once the caller aborts", async () => {
    const abort = new AbortController();
    const fake = fakeFetch((url) => {
      if (url.startsWith("https://html.duckduckgo.com/html/")) return new Response(SEARCH_HTML);
      abort.abort();
      throw new Error("page request aborted");
    });
    const provider = new WebContextProvider({ fetch: fake.fetch });

    await expect(provider.fetchContext("weather in Paris", 2, abort.signal)).rejects.toThrow("page request aborted");
    expect(fake.requests.map((request) => request.url)).toEqual([
      "https://html.duckduckgo.com/html/?q=weather+in+Paris",
      "https://example.test/paris",
    ]);
    expect(fake.requests[1]?.init?.signal?.aborted).toBe(true);
  });

  it("does not search when the caller has already aborted", async () => {
    const fake = fakeFetch(() => new Response(SEARCH_HTML));
    const provider = new WebContextProvider({ fetch: fake.fetch });

    await expect(provider.fetchContext("weather", 2, AbortSignal.abort())).rejects.toThrow();
    expect(fake.requests).toHaveLength(0);
  });

  it("returns nothing when the search fails", async () => {
    const fake = fakeFetch(() => new Response("busy", { status: 503 }));
    const provider = new WebContextProvider({ fetch: fake.fetch });

    expect(await provider.fetchContext("weather", 3)).toBe("");
    expect(fake.requests).toHaveLength(1);
  });
});
