import type { FailureKind, RemoteFailure } from "./types";

export class TransportFailure extends Error implements RemoteFailure {
  readonly kind: FailureKind = "transport";

  constructor(
    readonly label: string,
    readonly status: number | undefined,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${label} failed: ${message}`, options);
    this.name = "TransportFailure";
  }
}

export class ValidationFailure extends Error implements RemoteFailure {
  readonly kind: FailureKind = "validation";

  constructor(
    readonly label: string,
    readonly issues: string[]
  ) {
    super(`${label} returned an unexpected payload: ${issues.join("; ")}`);
    this.name = "ValidationFailure";
  }
}

export function isRemoteFailure(error: unknown): error is RemoteFailure {
  return error instanceof TransportFailure || error instanceof ValidationFailure;
}

/**
 * Anything thrown while talking to the API that is not already classified
 * is a transport failure. Octokit's RequestError carries the HTTP status.
 */
export function asRemoteFailure(label: string, error: unknown): RemoteFailure {
  if (isRemoteFailure(error)) {
    return error;
  }

  const status =
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number"
      ? error.status
      : undefined;
  const message = error instanceof Error ? error.message : String(error);
  return new TransportFailure(label, status, message, { cause: error });
}
