/**
 * Runtime errors raised while serving one extcap invocation.
 * Definition mistakes made while registering interfaces and controls are ValidationError instead.
 */

export type ExtcapErrorKind =
  | 'Io'
  | 'FlagParse'
  | 'Framing'
  | 'MissingInterface'
  | 'InvalidInterface'
  | 'UnknownStep'
  | 'User'
  | 'NotImplemented'
  | 'State';

export class ExtcapError extends Error {
  constructor(
    public readonly kind: ExtcapErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtcapError';
    Object.setPrototypeOf(this, ExtcapError.prototype);
  }

  static io(message: string, cause?: unknown): ExtcapError {
    return new ExtcapError('Io', message, { cause });
  }

  static flagParse(message: string, cause?: unknown): ExtcapError {
    return new ExtcapError('FlagParse', message, { cause });
  }

  static framing(message: string): ExtcapError {
    return new ExtcapError('Framing', message);
  }

  static missingInterface(): ExtcapError {
    return new ExtcapError('MissingInterface', 'Missing interface');
  }

  static invalidInterface(name: string): ExtcapError {
    return new ExtcapError('InvalidInterface', `Invalid interface: ${name}`);
  }

  static unknownStep(): ExtcapError {
    return new ExtcapError('UnknownStep', 'Unknown step requested');
  }

  static user(message: string, cause?: unknown): ExtcapError {
    return new ExtcapError('User', message, { cause });
  }

  static notImplemented(operation: string): ExtcapError {
    return new ExtcapError('NotImplemented', `Listener does not implement ${operation}()`);
  }

  static state(message: string): ExtcapError {
    return new ExtcapError('State', message);
  }
}

/** Configuration-class kinds map to EXIT_CONFIG at the process boundary. */
export function isConfigurationError(err: unknown): boolean {
  return (
    err instanceof ExtcapError &&
    (err.kind === 'FlagParse' ||
      err.kind === 'MissingInterface' ||
      err.kind === 'InvalidInterface' ||
      err.kind === 'UnknownStep')
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
