// pattern: Functional Core

export {
  FIRST_LINE_MAX_CHARS,
  MAX_BUFFER,
  SANITIZER_MARKERS,
  StreamSanitizer,
  type SanitizerOptions,
  type SanitizerSignal,
  type SanitizerState,
  type SanitizerStep,
} from "./sanitizer.ts";
