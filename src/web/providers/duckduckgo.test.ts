// pattern: Imperative Shell

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createDuckDuckGoAdapter } from "./duckduckgo.ts";

const RESULTS_HTML = `
<html><body>
<div id="links">
  <div class="result">
    <a class="result__a" href="https://example.com/page1">Example Page 1</a>
    <a class="result__snippet">First snippet.</a>
  </div>
  <div class="result">
    <a class="result__a" href="//duckduckgo.com/l/?uddg=https%3A%2F%2Fexample.com%2Fpage2">Example Page 2</a>
    <a class="result__snippet">Second snippet.</a>
  </div>
  <div class="result">
    <a class="result__snippet">No anchor here</a>
  </div>
  <div class="result">
    <a class="result__a" href="https://example.com/page3">Example Page 3</a>
  </div>
</div>
</body></html>`;

describe("DuckDuckGo adapter", () => {
  let originalFetch: typeof fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("parses results, decodes redirect links and skips anchorless entries", async () => {
    globalThis.fetch = (async () => new Response(RESULTS_HTML, { status: 200 })) as unknown as typeof fetch;

    const response = await createDuckDuckGoAdapter().search("example", 10);

    expect(response.provider).toBe("duckduckgo");
    expect(response.results).toEqual([
      { title: "Example Page 1", url: "https://example.com/page1", snippet: "First snippet." },
      { title: "Example Page 2", url: "https://example.com/page2", snippet: "Second snippet." },
      { title: "Example Page 3", url: "https://example.com/page3", snippet: "" },
    ]);
  });

  it("stops at the limit", async () => {
    globalThis.fetch = (async () => new Response(RESULTS_HTML, { status: 200 })) as unknown as typeof fetch;

    const response = await createDuckDuckGoAdapter().search("example", 2);

    expect(response.results.map((r) => r.title)).toEqual(["Example Page 1", "Example Page 2"]);
  });

  it("posts the query form-encoded", async () => {
    let body = "";
    let method = "";
    globalThis.fetch = (async (_input: string, init: RequestInit) => {
      body = typeof init.body === "string" ? init.body : "";
      method = init.method ?? "";
      return new Response("<html></html>", { status: 200 });
    }) as unknown as typeof fetch;

    await createDuckDuckGoAdapter().search("rust & go", 5);

    expect(method).toBe("POST");
    expect(body).toBe("q=rust%20%26%20go");
  });

  it("throws on a non-2xx status", async () => {
    globalThis.fetch = (async () =>
      new Response("", { status: 403, statusText: "Forbidden" })) as unknown as typeof fetch;

    await expect(createDuckDuckGoAdapter().search("q", 5)).rejects.toThrow("403");
  });
});
