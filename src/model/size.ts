// pattern: Functional Core

const SMALL_MODEL_THRESHOLD_B = 4;
const LARGE_MODEL_THRESHOLD_B = 12;

/** Parameter count in billions read from a name such as "llama3.1:8b", or null. */
export function modelParamSize(model: string): number | null {
  const match = /(\d+(?:\.\d+)?)b\b/.exec(model.toLowerCase());
  return match?.[1] ? Number.parseFloat(match[1]) : null;
}

export function isSmallModel(model: string): boolean {
  const name = model.toLowerCase();
  if (["tiny", "mini", "small"].some((word) => name.includes(word))) {
    return true;
  }
  const size = modelParamSize(name);
  return size !== null && size < SMALL_MODEL_THRESHOLD_B;
}

export function isLargeModel(model: string): boolean {
  const size = modelParamSize(model);
  return size !== null && size >= LARGE_MODEL_THRESHOLD_B;
}
