// pattern: Functional Core

import type { CacheEntry } from "../cache/types.ts";
import type { ToolKind } from "../web/types.ts";

/** A tool and the query to run it with. For `recall` the query is a search id. */
export type ToolRequest = {
  readonly kind: ToolKind;
  readonly query: string;
};

/**
 * What one processing cycle decided to do. Made once, then only read.
 */
export type SearchDecision =
  | { readonly type: "none" }
  | { readonly type: "cache-hit"; readonly kind: ToolKind; readonly entry: CacheEntry }
  | ({ readonly type: "tool" } & ToolRequest);
