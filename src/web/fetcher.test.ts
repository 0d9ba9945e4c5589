// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { SimilarityCache } from "../cache/cache.ts";
import { CacheConfigSchema } from "../config/schema.ts";
import type { ContentExtractor } from "./extract.ts";
import { fetchAll, runFetchTask, withGrace, type FetcherDeps } from "./fetcher.ts";
import { createFetchTask, planTasks } from "./task.ts";
import { RequestCancelledError, type Candidate, type Extraction } from "./types.ts";

type Behaviour = Extraction | null | Error;

function timeoutError(): Error {
  const error = new Error("The operation was aborted due to timeout");
  error.name = "TimeoutError";
  return error;
}

function fakeExtractor(pages: Record<string, Behaviour>) {
  const calls: Array<string> = [];
  const extractor: ContentExtractor = {
    async extract(candidate) {
      calls.push(candidate.url);
      await new Promise((resolve) => setTimeout(resolve, 0));
      const page = pages[candidate.url];
      if (page instanceof Error) throw page;
      return page ?? null;
    },
  };
  return { extractor, calls };
}

function deps(extractor: ContentExtractor): FetcherDeps {
  return {
    cache: new SimilarityCache({ config: CacheConfigSchema.parse({}) }),
    extractor,
    ttlSeconds: () => 3600,
  };
}

function candidate(path: string): Candidate {
  return { url: `https://example.com/${path}`, extractor: "article" };
}

const options = { maxLength: 1000, readLength: 1000 };

describe("runFetchTask", () => {
  it("stops at the first candidate that yields content", async () => {
    const { extractor, calls } = fakeExtractor({
      "https://example.com/bravo": { title: "Bravo", content: "bravo page" },
      "https://example.com/charlie": { title: "Charlie", content: "charlie page" },
    });
    const task = createFetchTask("web", [candidate("alpha"), candidate("bravo"), candidate("charlie")]);

    const done = await runFetchTask(task, deps(extractor), options);

    expect(calls).toEqual(["https://example.com/alpha", "https://example.com/bravo"]);
    expect(done.states).toEqual(["empty", "extracted", "pending"]);
    expect(done.outcome).toEqual({
      type: "extracted",
      url: "https://example.com/bravo",
      title: "Bravo",
      content: "bravo page",
      cached: false,
    });
  });

  it("treats a timeout as empty and an error as failed", async () => {
    const { extractor } = fakeExtractor({
      "https://example.com/alpha": timeoutError(),
      "https://example.com/bravo": new Error("HTTP 503 Service Unavailable"),
    });
    const task = createFetchTask("web", [candidate("alpha"), candidate("bravo")]);

    const done = await runFetchTask(task, deps(extractor), options);

    expect(done.outcome).toEqual({
      type: "failed-overall",
      attempts: [
        { url: "https://example.com/alpha", state: "empty" },
        { url: "https://example.com/bravo", state: "failed", error: "HTTP 503 Service Unavailable" },
      ],
    });
  });

  it("serves a repeated url from the cache", async () => {
    const { extractor, calls } = fakeExtractor({
      "https://example.com/alpha": { title: null, content: "alpha page" },
    });
    const shared = deps(extractor);

    await runFetchTask(createFetchTask("web", [candidate("alpha")]), shared, options);
    const second = await runFetchTask(createFetchTask("web", [candidate("alpha")]), shared, options);

    expect(calls).toHaveLength(1);
    expect(second.outcome).toMatchObject({ type: "extracted", cached: true, content: "alpha page" });
  });

  it("caches the whole page and clips it for each reader", async () => {
    const page = "a".repeat(30) + "b".repeat(30);
    const { extractor, calls } = fakeExtractor({
      "https://example.com/alpha": { title: null, content: page },
    });
    const shared = deps(extractor);

    const short = await runFetchTask(createFetchTask("web", [candidate("alpha")]), shared, {
      maxLength: 1000,
      readLength: 20,
    });
    const long = await runFetchTask(createFetchTask("web", [candidate("alpha")]), shared, {
      maxLength: 1000,
      readLength: 1000,
    });

    expect(calls).toHaveLength(1);
    expect(short.outcome).toMatchObject({ type: "extracted", cached: false, content: "a".repeat(20) });
    expect(long.outcome).toMatchObject({ type: "extracted", cached: true, content: page });
  });

  it("refuses to start once the request is cancelled", async () => {
    const { extractor, calls } = fakeExtractor({});
    const controller = new AbortController();
    controller.abort();

    await expect(
      runFetchTask(createFetchTask("web", [candidate("alpha")]), deps(extractor), {
        ...options,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RequestCancelledError);
    expect(calls).toEqual([]);
  });
});

describe("fetchAll", () => {
  it("fetches a fallback shared by two tasks once", async () => {
    const { extractor, calls } = fakeExtractor({
      "https://example.com/alpha": new Error("HTTP 404 Not Found"),
      "https://example.com/bravo": null,
      "https://example.com/charlie": { title: "Charlie", content: "charlie page" },
    });
    const tasks = planTasks("web", [candidate("alpha"), candidate("bravo"), candidate("charlie")], 2);

    const done = await fetchAll(tasks, deps(extractor), { ...options, concurrency: 2, graceMs: 50 });

    expect(calls.filter((url) => url === "https://example.com/charlie")).toHaveLength(1);
    expect(done.map((t) => t.outcome?.type)).toEqual(["extracted", "extracted"]);
    const cachedFlags = done.map((t) => (t.outcome?.type === "extracted" ? t.outcome.cached : null));
    expect(cachedFlags.sort()).toEqual([false, true]);
  });

  it("returns tasks in plan order", async () => {
    const { extractor } = fakeExtractor({
      "https://example.com/alpha": { title: "A", content: "alpha page" },
      "https://example.com/bravo": { title: "B", content: "bravo page" },
    });
    const tasks = planTasks("web", [candidate("alpha"), candidate("bravo")], 2);

    const done = await fetchAll(tasks, deps(extractor), { ...options, concurrency: 1, graceMs: 50 });

    expect(done.map((t) => (t.outcome?.type === "extracted" ? t.outcome.url : null))).toEqual([
      "https://example.com/alpha",
      "https://example.com/bravo",
    ]);
  });
});

describe("withGrace", () => {
  it("passes the result through without a signal", async () => {
    await expect(withGrace(Promise.resolve(7), undefined, 10)).resolves.toBe(7);
  });

  it("lets work finish inside the grace window", async () => {
    const controller = new AbortController();
    const work = new Promise<string>((resolve) => setTimeout(() => resolve("done"), 5));
    controller.abort();

    await expect(withGrace(work, controller.signal, 200)).resolves.toBe("done");
  });

  it("gives up after the grace window", async () => {
    const controller = new AbortController();
    const work = new Promise<string>(() => undefined);
    const guarded = withGrace(work, controller.signal, 10);
    controller.abort();

    await expect(guarded).rejects.toBeInstanceOf(RequestCancelledError);
  });
});
