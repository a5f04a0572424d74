export type InvocationErrorKind = "launch-failure" | "non-zero-exit" | "timeout";

export class InvocationError extends Error {
  constructor(
    message: string,
    readonly kind: InvocationErrorKind,
    readonly rawStderr: string = "",
    readonly exitCode: number | null = null,
  ) {
    super(message);
    this.name = "InvocationError";
  }
}

export function isInvocationError(error: unknown): error is InvocationError {
  return error instanceof InvocationError;
}
