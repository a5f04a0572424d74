import type { InvocationError } from "../execution/invocationError.js";

export type UnitState = "loading" | "success" | "failed" | "disabled";

export type InvocationOutcome =
  | { readonly ok: true; readonly output: string }
  | { readonly ok: false; readonly error: InvocationError };

export interface UnitDescriptor {
  readonly id: string;
  readonly sourcePath: string;
  /** Interval token taken from the file name, e.g. `5m` in `weather.5m.sh`. */
  readonly intervalToken?: string;
}

export type SourceChange =
  | { readonly type: "added"; readonly descriptor: UnitDescriptor }
  | { readonly type: "removed"; readonly id: string };

export interface UnitSource {
  scan(): readonly UnitDescriptor[];
  /** Returns an unsubscribe function. */
  watch(listener: (change: SourceChange) => void): () => void;
}

export type ContentListener = (content: string | undefined) => void;

export class UnitContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnitContractError";
  }
}
