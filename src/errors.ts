export class WardenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnsupportedManagerError extends WardenError {}

export class ManagerNotFoundError extends WardenError {}

export class UnsupportedVersionError extends WardenError {
  constructor(
    readonly manager: string,
    readonly found: string | null,
    readonly minimum: string,
  ) {
    super(
      found
        ? `${manager} v${found} is not supported (minimum v${minimum})`
        : `Could not determine the ${manager} version (minimum v${minimum})`,
    );
  }
}

/** Dry-run or listing output that could not be turned into a complete target list. */
export class ResolutionError extends WardenError {}

export class PolicyError extends WardenError {}

/** A recoverable verifier failure such as a network error, as opposed to a fault in its code. */
export class VerifierError extends WardenError {}

export class CancelledError extends WardenError {
  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
