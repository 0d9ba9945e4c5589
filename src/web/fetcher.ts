// pattern: Imperative Shell

/**
 * Runs fetch tasks: candidates within a task strictly in order, tasks in
 * parallel under a p-limit pool. Every URL goes through the cache's URL
 * namespace, so two tasks that reach the same fallback fetch it once.
 */

import pLimit from "p-limit";
import type { SimilarityCache } from "../cache/cache.ts";
import { urlHost } from "../cache/fingerprint.ts";
import { clipContent, type ContentExtractor, type ExtractOptions } from "./extract.ts";
import { errorMessage, isTimeoutError } from "./http.ts";
import { currentCandidate, isTerminal, markFetching, recordAttempt } from "./task.ts";
import {
  RequestCancelledError,
  type AttemptResult,
  type Candidate,
  type FetchTask,
  type ToolKind,
} from "./types.ts";

export type FetcherDeps = {
  readonly cache: SimilarityCache;
  readonly extractor: ContentExtractor;
  readonly ttlSeconds: (kind: ToolKind) => number;
};

/**
 * `maxLength` bounds what the URL cache keeps; `readLength` is what this
 * task takes from it.
 */
export type FetchOptions = ExtractOptions & {
  readonly readLength: number;
};

export type FetchAllOptions = FetchOptions & {
  readonly concurrency: number;
  readonly graceMs: number;
};

async function attempt(
  candidate: Candidate,
  kind: ToolKind,
  deps: FetcherDeps,
  options: FetchOptions,
): Promise<AttemptResult> {
  if (options.signal?.aborted) {
    throw new RequestCancelledError();
  }

  try {
    const resolution = await deps.cache.resolve("url", candidate.url, undefined, deps.ttlSeconds(kind), async () => {
      const extraction = await deps.extractor.extract(candidate, { signal: options.signal, maxLength: options.maxLength });
      if (!extraction) {
        return null;
      }
      const host = urlHost(candidate.url);
      return {
        content: extraction.content,
        title: extraction.title,
        sourceUrl: candidate.url,
        kind,
        sources: host ? [host] : [],
      };
    });

    if (!resolution) {
      return { type: "empty" };
    }
    const { payload } = resolution.entry;
    return {
      type: "extracted",
      extraction: { content: clipContent(payload.content, options.readLength), title: payload.title ?? null },
      cached: resolution.cached,
    };
  } catch (error) {
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }
    if (isTimeoutError(error)) {
      return { type: "empty" };
    }
    return { type: "failed", error: errorMessage(error) };
  }
}

export async function runFetchTask(
  task: FetchTask,
  deps: FetcherDeps,
  options: FetchOptions,
): Promise<FetchTask> {
  let current = task;

  while (!isTerminal(current)) {
    const candidate = currentCandidate(current);
    if (!candidate) break;

    current = markFetching(current);
    const result = await attempt(candidate, current.kind, deps, options);
    current = recordAttempt(current, result);

    if (result.type === "extracted") {
      console.log(`[fetch] extracted ${candidate.url}${result.cached ? " (cached)" : ""}`);
    } else if (!isTerminal(current)) {
      console.log(`[fetch] ${candidate.url} ${result.type}, advancing to candidate ${current.cursor + 1}`);
    } else {
      console.warn(`[fetch] all ${current.candidates.length} candidates exhausted`);
    }
  }

  return current;
}

/**
 * Settle `work`, or once `signal` aborts give it `graceMs` to finish before
 * rejecting with RequestCancelledError.
 */
export function withGrace<T>(work: Promise<T>, signal: AbortSignal | undefined, graceMs: number): Promise<T> {
  if (!signal) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      timer = setTimeout(() => reject(new RequestCancelledError()), graceMs);
    };
    const cleanup = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}

export async function fetchAll(
  tasks: ReadonlyArray<FetchTask>,
  deps: FetcherDeps,
  options: FetchAllOptions,
): Promise<Array<FetchTask>> {
  const limit = pLimit(options.concurrency);
  const onAbort = () => limit.clearQueue();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const fetchOptions: FetchOptions = {
    signal: options.signal,
    maxLength: options.maxLength,
    readLength: options.readLength,
  };
  try {
    return await withGrace(
      Promise.all(tasks.map((task) => limit(() => runFetchTask(task, deps, fetchOptions)))),
      options.signal,
      options.graceMs,
    );
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }
}
