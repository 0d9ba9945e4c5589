// pattern: Functional Core

import { describe, it, expect, vi } from "vitest";
import type { ModelProvider, ModelRequest } from "../model/types.ts";
import {
  annotateSearchId,
  cleanResponse,
  detectCutoff,
  detectIntent,
  generateSearchQuery,
  isRecencySensitive,
  latestSearchId,
  parseToolTag,
} from "./analyzer.ts";

const now = new Date("2026-10-19T12:00:00Z");

describe("isRecencySensitive", () => {
  it.each([
    ["What is the latest iPhone?", true],
    ["Who won the match yesterday?", true],
    ["What happened this week in tech?", true],
    ["Is it going to rain? Check the weather", true],
    ["Best films of 2026", true],
    ["Best films of 2025", true],
    ["What happened in 2019?", false],
    ["Who wrote Hamlet?", false],
    ["I know how to cook rice", false],
  ])("%s -> %s", (prompt, expected) => {
    expect(isRecencySensitive(prompt, now)).toBe(expected);
  });
});

describe("latestSearchId", () => {
  it("finds the newest annotation", () => {
    expect(
      latestSearchId([
        { role: "assistant", content: "Sunny. [search_id: 3]" },
        { role: "user", content: "and tomorrow?" },
        { role: "assistant", content: "Rain.\n\n[search_id: 7]" },
      ]),
    ).toBe(7);
  });

  it("is null without annotations", () => {
    expect(latestSearchId([{ role: "assistant", content: "Hello" }])).toBeNull();
  });
});

describe("detectIntent", () => {
  it("routes weather phrasing to the place", () => {
    expect(detectIntent("What's the weather in Paris?", [])).toEqual({ type: "tool", kind: "weather", query: "Paris" });
    expect(detectIntent("forecast for New York today", [])).toEqual({
      type: "tool",
      kind: "weather",
      query: "New York",
    });
  });

  it("routes opinion phrasing to reddit", () => {
    expect(detectIntent(" What do people think about the Framework laptop? ", [])).toEqual({
      type: "tool",
      kind: "reddit",
      query: "What do people think about the Framework laptop?",
    });
  });

  it("routes wikipedia phrasing to the topic", () => {
    expect(detectIntent("What does Wikipedia say about Ada Lovelace?", [])).toEqual({
      type: "tool",
      kind: "wikipedia",
      query: "Ada Lovelace",
    });
    expect(detectIntent("Ada Lovelace on wikipedia", [])).toMatchObject({ query: "Ada Lovelace" });
  });

  it("recalls a prior search referenced in the conversation", () => {
    const history = [
      { role: "user" as const, content: "weather in Oslo" },
      { role: "assistant" as const, content: "It is 4°C.\n\n[search_id: 4]" },
    ];

    expect(detectIntent("Where did you find that?", history)).toEqual({ type: "tool", kind: "recall", query: "4" });
    expect(detectIntent("Where did you find that?", [])).toBeNull();
  });

  it("leaves ordinary questions alone", () => {
    expect(detectIntent("Who wrote Hamlet?", [])).toBeNull();
  });
});

describe("parseToolTag", () => {
  it("reads each tag", () => {
    expect(parseToolTag("WEATHER: Boston")).toEqual({ kind: "weather", query: "Boston" });
    expect(parseToolTag("WIKIPEDIA: Ada Lovelace")).toEqual({ kind: "wikipedia", query: "Ada Lovelace" });
    expect(parseToolTag("WIKI: Ada Lovelace")).toEqual({ kind: "wikipedia", query: "Ada Lovelace" });
    expect(parseToolTag("REDDIT: budget headphones")).toEqual({ kind: "reddit", query: "budget headphones" });
    expect(parseToolTag("WEB: rust release")).toEqual({ kind: "web", query: "rust release" });
  });

  it("maps a bare search tag to the web", () => {
    expect(parseToolTag("search: eiffel tower height")).toEqual({ kind: "web", query: "eiffel tower height" });
  });

  it("finds a tag on a later line and strips quotes", () => {
    expect(parseToolTag('Let me check.\nGOOGLE: "latest rust release"')).toEqual({
      kind: "web",
      query: "latest rust release",
    });
  });

  it("strips markdown around the tag", () => {
    expect(parseToolTag("**REDDIT:** budget headphones")).toEqual({ kind: "reddit", query: "budget headphones" });
  });

  it("reads the id of a recall tag", () => {
    expect(parseToolTag("RECALL: search_id 12")).toEqual({ kind: "recall", query: "12" });
    expect(parseToolTag("RECALL: the last one")).toBeNull();
  });

  it("ignores empty tags and prose", () => {
    expect(parseToolTag("GOOGLE:")).toBeNull();
    expect(parseToolTag("The weather: sunny and warm")).toBeNull();
  });
});

describe("detectCutoff", () => {
  it("returns the matched pattern", () => {
    expect(detectCutoff("As of my knowledge cutoff in 2023, the record stood.")).toBe("knowledge cut-?off");
    expect(detectCutoff("I DON'T HAVE INFORMATION about that event.")).toBe("don'?t have information");
  });

  it("is null for a plain answer", () => {
    expect(detectCutoff("Paris is the capital of France.")).toBeNull();
  });
});

describe("cleanResponse", () => {
  it("drops tag lines and search id annotations", () => {
    expect(cleanResponse("Here you go.\nGOOGLE: something\nMore text [search_id: 3]")).toBe("Here you go.\nMore text");
  });

  it("round-trips an annotation", () => {
    expect(cleanResponse(annotateSearchId("Sunny.", 9))).toBe("Sunny.");
    expect(annotateSearchId("Sunny.", 9)).toBe("Sunny.\n\n[search_id: 9]");
  });
});

describe("generateSearchQuery", () => {
  function provider(reply: string) {
    const complete = vi.fn(async (_request: ModelRequest) => ({
      text: reply,
      usage: { input_tokens: 10, output_tokens: 3 },
    }));
    const model: ModelProvider = {
      complete,
      async *stream() {
        yield { type: "stop" as const, usage: null };
      },
    };
    return { model, complete };
  }

  it("uses the tag the model writes", async () => {
    const { model, complete } = provider("WEATHER: Boston");

    const request = await generateSearchQuery(model, {
      prompt: "is it cold in boston",
      history: [{ role: "user", content: "hi" }, { role: "assistant", content: "hello" }],
      model: "llama3:8b",
      now,
    });

    expect(request).toEqual({ kind: "weather", query: "Boston" });
    const sent = complete.mock.calls[0]?.[0];
    expect(sent?.system).toContain("Today's date: 2026-10-19");
    expect(sent?.messages).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
      { role: "user", content: "is it cold in boston" },
    ]);
  });

  it("falls back to a web search for the prompt", async () => {
    const { model } = provider("I would search for the weather.");

    expect(await generateSearchQuery(model, { prompt: " boston weather ", history: [], model: "m", now })).toEqual({
      kind: "web",
      query: "boston weather",
    });
  });
});
