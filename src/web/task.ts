// pattern: Functional Core

/**
 * FetchTask transitions. The cursor only moves forward, one candidate at a
 * time, and the first extracted candidate ends the task.
 */

import { canonicalUrl } from "../cache/fingerprint.ts";
import type {
  AttemptResult,
  Candidate,
  FetchOutcome,
  FetchTask,
  ToolKind,
  UrlAttempt,
  UrlState,
} from "./types.ts";

export function createFetchTask(kind: ToolKind, candidates: ReadonlyArray<Candidate>): FetchTask {
  const task: FetchTask = {
    kind,
    candidates,
    states: candidates.map((): UrlState => "pending"),
    errors: candidates.map(() => undefined),
    cursor: 0,
    outcome: null,
  };
  return candidates.length === 0 ? { ...task, outcome: { type: "failed-overall", attempts: [] } } : task;
}

export function isTerminal(task: FetchTask): boolean {
  return task.outcome !== null;
}

export function currentCandidate(task: FetchTask): Candidate | null {
  if (isTerminal(task)) {
    return null;
  }
  return task.candidates[task.cursor] ?? null;
}

function withState(task: FetchTask, state: UrlState, error?: string): FetchTask {
  return {
    ...task,
    states: task.states.map((s, i) => (i === task.cursor ? state : s)),
    errors: task.errors.map((e, i) => (i === task.cursor ? error : e)),
  };
}

export function markFetching(task: FetchTask): FetchTask {
  if (!currentCandidate(task)) {
    throw new Error("fetch task has no candidate to fetch");
  }
  return withState(task, "fetching");
}

export function attempts(task: FetchTask): Array<UrlAttempt> {
  return task.candidates.flatMap((candidate, i): Array<UrlAttempt> => {
    const state = task.states[i];
    if (!state || state === "pending") return [];
    const error = task.errors[i];
    return [error ? { url: candidate.url, state, error } : { url: candidate.url, state }];
  });
}

/** Settle the current candidate and advance the cursor or finish the task. */
export function recordAttempt(task: FetchTask, result: AttemptResult): FetchTask {
  const candidate = currentCandidate(task);
  if (!candidate) {
    throw new Error("fetch task is already terminal");
  }

  if (result.type === "extracted") {
    const settled = withState(task, "extracted");
    const outcome: FetchOutcome = {
      type: "extracted",
      url: candidate.url,
      title: result.extraction.title,
      content: result.extraction.content,
      cached: result.cached,
    };
    return { ...settled, outcome };
  }

  const settled =
    result.type === "failed" ? withState(task, "failed", result.error) : withState(task, "empty");
  const cursor = task.cursor + 1;

  if (cursor >= task.candidates.length) {
    return { ...settled, cursor, outcome: { type: "failed-overall", attempts: attempts(settled) } };
  }
  return { ...settled, cursor };
}

/** Drop candidates whose canonical URL was already listed (and unparseable ones). */
export function dedupeCandidates(candidates: ReadonlyArray<Candidate>): Array<Candidate> {
  const seen = new Set<string>();
  const unique: Array<Candidate> = [];
  for (const candidate of candidates) {
    const canonical = canonicalUrl(candidate.url);
    if (!canonical || seen.has(canonical)) continue;
    seen.add(canonical);
    unique.push(candidate);
  }
  return unique;
}

/**
 * One task per page to scrape: task i starts at candidate i and falls back,
 * in order, to the candidates past the scrape count.
 */
export function planTasks(
  kind: ToolKind,
  candidates: ReadonlyArray<Candidate>,
  scrapeCount: number,
): Array<FetchTask> {
  const unique = dedupeCandidates(candidates);
  const primaries = unique.slice(0, scrapeCount);
  const fallbacks = unique.slice(scrapeCount);
  return primaries.map((primary) => createFetchTask(kind, [primary, ...fallbacks]));
}
