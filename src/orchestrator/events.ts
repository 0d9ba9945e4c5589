// pattern: Functional Core

import type { StreamEvent, StreamEventBody } from "./types.ts";

export type EventSequencer = {
  next(body: StreamEventBody): StreamEvent;
  readonly closed: boolean;
};

/**
 * Numbers a request's events and closes the sequence at the first terminal
 * (`done` or `error`) event; anything after that throws.
 */
export function createEventSequencer(): EventSequencer {
  let seq = 0;
  let closed = false;

  return {
    get closed() {
      return closed;
    },

    next(body) {
      if (closed) {
        throw new Error(`event stream already closed, cannot emit ${body.type}`);
      }
      if (body.type === "done" || body.type === "error") {
        closed = true;
      }
      seq += 1;
      return { ...body, seq };
    },
  };
}
