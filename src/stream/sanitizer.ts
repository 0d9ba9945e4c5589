// pattern: Functional Core

/**
 * Token-level sanitizer for a streamed generation.
 *
 * Tokens pass through unless they start a control marker. A partial marker
 * is withheld until it either completes or stops matching; a completed tool
 * marker swallows the rest of its line and comes back as a signal, and a
 * `[search_id: N]` annotation is dropped. With `holdFirstLine` nothing is
 * shown until the first line is complete, so a tag or a knowledge-gap
 * admission in the opening line never reaches the reader.
 *
 * Output is never reordered or repeated. One instance per generation.
 */

import { detectCutoff, parseToolTag } from "../analyzer/analyzer.ts";
import type { ToolRequest } from "../analyzer/types.ts";

export const SANITIZER_MARKERS = [
  "SEARCH:",
  "GOOGLE:",
  "WEB:",
  "WEATHER:",
  "REDDIT:",
  "RECALL:",
  "WIKI:",
  "WIKIPEDIA:",
  "[search_id:",
] as const;

const ANNOTATION = "[search_id:";

/** Longest run of withheld characters before it is flushed as text. */
export const MAX_BUFFER = 12;

/** A first line longer than this is released without waiting for its end. */
export const FIRST_LINE_MAX_CHARS = 400;

export type SanitizerState =
  | "normal"
  | "buffering-marker"
  | "emitting-tool-call"
  | "cutoff-detected"
  | "terminal";

export type SanitizerSignal =
  | { readonly type: "tool-call"; readonly request: ToolRequest }
  | { readonly type: "cutoff"; readonly pattern: string };

export type SanitizerStep = {
  readonly text: string;
  readonly signal: SanitizerSignal | null;
};

export type SanitizerOptions = {
  readonly holdFirstLine?: boolean;
  /**
   * Watch for knowledge-gap phrases in the held first line and in all
   * visible text after it.
   */
  readonly detectCutoff?: boolean;
};

const EMPTY: SanitizerStep = { text: "", signal: null };

type MarkerHit = { readonly index: number; readonly marker: string };

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && /[\p{L}\p{N}_]/u.test(char);
}

function containsMarker(text: string): boolean {
  return SANITIZER_MARKERS.some((marker) => text.includes(marker));
}

/** Length of the longest suffix of `text` that could still grow into a marker. */
function partialMarkerLength(text: string): number {
  const longest = Math.min(text.length, ANNOTATION.length);
  for (let length = longest; length > 0; length--) {
    const suffix = text.slice(text.length - length);
    if (SANITIZER_MARKERS.some((marker) => marker.length > length && marker.startsWith(suffix))) {
      return length;
    }
  }
  return 0;
}

export class StreamSanitizer {
  private current: SanitizerState = "normal";
  private holding: boolean;
  private held = "";
  private pending = "";
  private marker = "";
  private captured = "";
  private visible = "";
  private readonly detectsCutoff: boolean;

  constructor(options: SanitizerOptions = {}) {
    this.holding = options.holdFirstLine ?? false;
    this.detectsCutoff = options.detectCutoff ?? false;
  }

  get state(): SanitizerState {
    return this.current;
  }

  /** Everything emitted so far. */
  get text(): string {
    return this.visible;
  }

  feed(token: string): SanitizerStep {
    if (this.current === "terminal") {
      throw new Error("sanitizer already finished");
    }
    if (this.current === "cutoff-detected") {
      return EMPTY;
    }

    if (!this.holding) {
      return this.process(token);
    }

    this.held += token;
    if (this.detectsCutoff && !containsMarker(this.held)) {
      const cutoff = this.cutoff(this.held);
      if (cutoff) return cutoff;
    }
    if (!this.held.includes("\n") && this.held.length < FIRST_LINE_MAX_CHARS) {
      return EMPTY;
    }
    return this.release();
  }

  finish(): SanitizerStep {
    if (this.current === "terminal") {
      throw new Error("sanitizer already finished");
    }
    if (this.current === "cutoff-detected") {
      this.current = "terminal";
      return EMPTY;
    }

    let step = EMPTY;
    if (this.holding) {
      step = this.release();
      if (step.signal?.type === "cutoff") {
        this.current = "terminal";
        return step;
      }
    }

    let text = step.text;
    let signal = step.signal;
    if (this.current === "emitting-tool-call") {
      signal ??= this.closeCapture();
    }
    if (this.pending) {
      text += this.pending;
      this.visible += this.pending;
      this.pending = "";
    }

    this.current = "terminal";
    return { text, signal };
  }

  private release(): SanitizerStep {
    this.holding = false;
    const line = this.held;
    this.held = "";
    return this.process(line);
  }

  private cutoff(text: string): SanitizerStep | null {
    const pattern = detectCutoff(text);
    if (!pattern) {
      return null;
    }
    this.current = "cutoff-detected";
    this.held = "";
    this.pending = "";
    return { text: "", signal: { type: "cutoff", pattern } };
  }

  private findMarker(input: string, emitted: string): MarkerHit | null {
    let best: MarkerHit | null = null;

    for (const marker of SANITIZER_MARKERS) {
      let index = input.indexOf(marker);
      while (index !== -1) {
        const before = index > 0 ? input[index - 1] : (emitted || this.visible).slice(-1);
        // Tool markers count only at a word start; "RESEARCH:" is prose.
        if (marker === ANNOTATION || !isWordChar(before)) break;
        index = input.indexOf(marker, index + 1);
      }
      if (index === -1) continue;
      if (!best || index < best.index || (index === best.index && marker.length > best.marker.length)) {
        best = { index, marker };
      }
    }

    return best;
  }

  private closeCapture(): SanitizerSignal | null {
    const marker = this.marker;
    const captured = this.captured;
    this.marker = "";
    this.captured = "";
    this.current = "normal";

    if (marker === ANNOTATION) {
      return null;
    }
    const request = parseToolTag(`${marker}${captured}`);
    return request ? { type: "tool-call", request } : null;
  }

  private process(chunk: string): SanitizerStep {
    let input = this.pending + chunk;
    this.pending = "";
    let out = "";
    let signal: SanitizerSignal | null = null;

    while (input) {
      if (this.current === "emitting-tool-call") {
        const end = input.indexOf(this.marker === ANNOTATION ? "]" : "\n");
        if (end === -1) {
          this.captured += input;
          break;
        }
        this.captured += input.slice(0, end);
        input = input.slice(end + 1);
        const closed = this.closeCapture();
        signal ??= closed;
        continue;
      }

      const hit = this.findMarker(input, out);
      if (hit) {
        out += input.slice(0, hit.index);
        this.marker = hit.marker;
        this.captured = "";
        this.current = "emitting-tool-call";
        input = input.slice(hit.index + hit.marker.length);
        continue;
      }

      const keep = partialMarkerLength(input);
      if (keep > 0 && keep <= MAX_BUFFER) {
        out += input.slice(0, input.length - keep);
        this.pending = input.slice(input.length - keep);
        this.current = "buffering-marker";
      } else {
        out += input;
        this.current = "normal";
      }
      break;
    }

    if (this.detectsCutoff && out) {
      const cutoff = this.cutoff(this.visible + out);
      if (cutoff) return cutoff;
    }

    this.visible += out;
    return { text: out, signal };
  }
}
