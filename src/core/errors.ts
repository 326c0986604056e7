export enum ErrorKind {
  Acquisition = 'ACQUISITION',
  Action = 'ACTION',
  Resolution = 'RESOLUTION',
  Startup = 'STARTUP',
}

export class DashboardError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly detail?: string,
  ) {
    super(message);
    this.name = `DashboardError/${kind}`;
  }
}

/** Provider unreachable, query failed or timed out. Stale rows are kept. */
export class AcquisitionError extends DashboardError {
  constructor(message: string, detail?: string) {
    super(ErrorKind.Acquisition, message, detail);
  }
}

/** A confirmed admin action failed. Surfaced once, never retried. */
export class ActionError extends DashboardError {
  constructor(message: string, detail?: string) {
    super(ErrorKind.Action, message, detail);
  }
}

/** Reverse lookup failed. The address stays raw for the session. */
export class ResolutionError extends DashboardError {
  constructor(message: string, detail?: string) {
    super(ErrorKind.Resolution, message, detail);
  }
}

/** No connection could be made at launch. The only fatal kind. */
export class StartupError extends DashboardError {
  constructor(message: string, detail?: string) {
    super(ErrorKind.Startup, message, detail);
  }
}

const FACTORIES: Record<ErrorKind, (message: string, detail?: string) => DashboardError> = {
  [ErrorKind.Acquisition]: (m, d) => new AcquisitionError(m, d),
  [ErrorKind.Action]: (m, d) => new ActionError(m, d),
  [ErrorKind.Resolution]: (m, d) => new ResolutionError(m, d),
  [ErrorKind.Startup]: (m, d) => new StartupError(m, d),
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalize anything thrown into a DashboardError of the given kind
 */
export function toDashboardError(error: unknown, kind: ErrorKind, detail?: string): DashboardError {
  if (error instanceof DashboardError && error.kind === kind) {
    return error;
  }
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  return FACTORIES[kind](errorMessage(error), detail ?? code);
}
