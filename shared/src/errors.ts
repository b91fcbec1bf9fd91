/** Unknown job, or a script/repository/file that does not resolve. */
export class NotFoundError extends Error {
  readonly name = "NotFoundError";
}

/** Malformed request shape. */
export class InvalidInputError extends Error {
  readonly name = "InvalidInputError";
}

/** The script's suffix maps to no known interpreter; nothing was spawned. */
export class LaunchResolutionError extends Error {
  readonly name = "LaunchResolutionError";

  constructor(readonly executablePath: string) {
    super(`No interpreter for ${executablePath}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
