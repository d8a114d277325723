import type { Translator } from "@/translation/translator";
import type { RawError } from "@/types/validation";

export type ResolutionState = "resolved" | "unresolved" | "suspended";

export type ResolutionContext = {
  locale?: string;
  translator?: Translator;
  requestId?: string;
  [key: string]: unknown;
};

/**
 * Outcome of resolving one request. Stages receive it, may replace
 * `errors`, and hand it to the next stage.
 */
export type Resolution<TValue = unknown, TError = RawError> = {
  value?: TValue;
  errors: TError[];
  state: ResolutionState;
  context: ResolutionContext;
};
