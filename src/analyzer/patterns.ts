// pattern: Functional Core

/** Phrases a model uses when it admits it lacks current information. */
export const CUTOFF_PATTERNS: ReadonlyArray<RegExp> = [
  /knowledge cut-?off/i,
  /don'?t have information on.*after/i,
  /don'?t have.*up-to-date/i,
  /can'?t provide.*current/i,
  /information may be outdated/i,
  /don'?t know.*after/i,
  /real-time access/i,
  /no specific/i,
  /no such thing/i,
  /couldn'?t find/i,
  /not officially/i,
  /not aware of/i,
  /no official/i,
  /available yet/i,
  /don'?t have information/i,
  /occurred after my/i,
  /my training data/i,
  /don'?t have.*recent/i,
];

export const TEMPORAL_PATTERN =
  /\b(?:latest|recent(?:ly)?|current(?:ly)?|today|tonight|yesterday|tomorrow|now|right now|breaking|this (?:week|month|year|weekend)|last (?:week|month|night))\b/i;

/** Subjects that only make sense as live data. */
export const LIVE_SUBJECT_PATTERN =
  /\b(?:weather|forecast|stock price|share price|exchange rate|live score|headlines|election results)\b/i;

export const YEAR_PATTERN = /\b(20\d{2})\b/g;

export const TOOL_TAG_PATTERN =
  /^[ \t>*_`-]*(WEATHER|GOOGLE|WEB|REDDIT|WIKI|WIKIPEDIA|SEARCH|RECALL)\s*:\s*(.*?)\s*$/im;

export const TOOL_TAG_LINE_PATTERN =
  /^[ \t>*_`-]*(?:WEATHER|GOOGLE|WEB|REDDIT|WIKI|WIKIPEDIA|SEARCH|RECALL)\s*:.*(?:\r?\n|$)/gim;

export const SEARCH_ID_PATTERN = /\[search_id:\s*(\d+)\s*\]/gi;

export const WEATHER_INTENT_PATTERN =
  /\b(?:weather|forecast|temperature)\b.*?\b(?:in|for|at)\s+([^?!.,;]+)/i;

export const TRAILING_TIME_PATTERN =
  /\s+(?:right now|now|today|tonight|tomorrow|this (?:week|weekend)|currently)$/i;

export const REDDIT_INTENT_PATTERN =
  /\breddit\b|\bpeople (?:think|say|saying)\b|\bopinions?\b|\breviews?\b/i;

export const WIKIPEDIA_INTENT_PATTERN = /\bwiki(?:pedia)?\b/i;

export const RECALL_INTENT_PATTERN =
  /\b(?:that|this|the|your|previous|last|earlier)\s+(?:search|sources?|results?|article|page|link)\b|\bwhere did you (?:find|get)\b|\byou (?:found|searched|looked up)\b/i;
