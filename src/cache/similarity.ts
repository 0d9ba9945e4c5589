// pattern: Functional Core

/**
 * Similarity signatures for approximate cache matching: token sets for
 * Jaccard, term-frequency vectors for cosine and a 64-bit SimHash for
 * near-duplicate filtering. Synonyms collapse onto the head word of their
 * group before the synonym Jaccard and the SimHash are computed.
 */

import { createHash } from 'node:crypto';
import stopwordList from './data/stopwords.json';
import synonymGroups from './data/synonyms.json';

export type Signature = {
  readonly tokens: ReadonlyArray<string>;
  readonly canonical: ReadonlyArray<string>;
  readonly vector: Readonly<Record<string, number>>;
  readonly simhash: string;
};

const SIMHASH_BITS = 64;

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export function buildSynonymIndex(
  groups: ReadonlyArray<ReadonlyArray<string>>,
): ReadonlyMap<string, string> {
  const index = new Map<string, string>();
  for (const group of groups) {
    const head = group[0];
    if (!head) continue;
    for (const word of group) {
      if (!index.has(word)) {
        index.set(word, head);
      }
    }
  }
  return index;
}

const SYNONYMS = buildSynonymIndex(synonymGroups);

export function stripSiteOperators(query: string): string {
  return query.replace(/site:\S+\s*/gi, '').trim();
}

/** Lower-case, drop punctuation and stop words. Order is preserved. */
export function tokenize(text: string): Array<string> {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]+/gu, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token));
}

export function normalizeQuery(query: string): string {
  return tokenize(stripSiteOperators(query)).join(' ');
}

export function canonicalize(
  tokens: ReadonlyArray<string>,
  index: ReadonlyMap<string, string> = SYNONYMS,
): Array<string> {
  return tokens.map((token) => index.get(token) ?? token);
}

export function termVector(tokens: ReadonlyArray<string>): Record<string, number> {
  const vector: Record<string, number> = {};
  for (const token of tokens) {
    vector[token] = (vector[token] ?? 0) + 1;
  }
  return vector;
}

export function jaccard(a: ReadonlyArray<string>, b: ReadonlyArray<string>): number {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size === 0 && right.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection++;
  }
  return intersection / (left.size + right.size - intersection);
}

export function cosine(
  a: Readonly<Record<string, number>>,
  b: Readonly<Record<string, number>>,
): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (const [token, weight] of Object.entries(a)) {
    normA += weight * weight;
    dot += weight * (b[token] ?? 0);
  }
  for (const weight of Object.values(b)) {
    normB += weight * weight;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** 64-bit SimHash over term frequencies, as 16 hex digits. */
export function simhash(tokens: ReadonlyArray<string>): string {
  const weights = new Array<number>(SIMHASH_BITS).fill(0);

  for (const [token, count] of Object.entries(termVector(tokens))) {
    const hash = createHash('sha1').update(token).digest().readBigUInt64BE(0);
    for (let bit = 0; bit < SIMHASH_BITS; bit++) {
      const set = ((hash >> BigInt(bit)) & 1n) === 1n;
      weights[bit] = (weights[bit] ?? 0) + (set ? count : -count);
    }
  }

  let fingerprint = 0n;
  weights.forEach((weight, bit) => {
    if (weight > 0) {
      fingerprint |= 1n << BigInt(bit);
    }
  });

  return fingerprint.toString(16).padStart(16, '0');
}

const HEX_DIGEST = /^[0-9a-f]{16}$/;

/** Number of differing bits; malformed digests count as maximally distant. */
export function hammingDistance(a: string, b: string): number {
  if (!HEX_DIGEST.test(a) || !HEX_DIGEST.test(b)) {
    return SIMHASH_BITS;
  }
  let diff = BigInt(`0x${a}`) ^ BigInt(`0x${b}`);
  let count = 0;
  while (diff > 0n) {
    count += Number(diff & 1n);
    diff >>= 1n;
  }
  return count;
}

export function signatureOf(tokens: ReadonlyArray<string>, useSynonyms: boolean): Signature {
  const canonical = useSynonyms ? canonicalize(tokens) : [...tokens];
  return {
    tokens: [...new Set(tokens)],
    canonical: [...new Set(canonical)],
    vector: termVector(tokens),
    simhash: simhash(canonical),
  };
}

/**
 * Composite score: the best of plain Jaccard, synonym-collapsed Jaccard and
 * the mean of Jaccard and cosine. Never below plain Jaccard.
 */
export function similarityScore(a: Signature, b: Signature): number {
  const plain = jaccard(a.tokens, b.tokens);
  const synonym = jaccard(a.canonical, b.canonical);
  const blended = (plain + cosine(a.vector, b.vector)) / 2;
  return Math.max(plain, synonym, blended);
}
