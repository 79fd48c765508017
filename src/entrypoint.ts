/**
 * Process entrypoint for a provider: run the requested step, then exit.
 * Exit codes: 0 = success, EXIT_CONFIG (1) = flag/interface/step error, EXIT_RUNTIME (2) = any other failure.
 */

import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { ExtcapError, errorMessage, isConfigurationError } from './errors.js';
import type { Extcap, ExtcapListener, RunOptions } from './extcap.js';
import { logError } from './logger.js';
import { ValidationError } from './validation.js';

/** Exit code for an error raised by run(). */
export function exitCodeFor(err: unknown): number {
  return isConfigurationError(err) ? EXIT_CONFIG : EXIT_RUNTIME;
}

/** One-line report printed to stderr, whatever the log threshold. */
export function formatFailure(name: string, err: unknown): string {
  if (err instanceof ExtcapError) {
    return `${name}: ${err.message}`;
  }
  if (err instanceof ValidationError) {
    const what = err.field === undefined ? err.definition : `${err.definition} ${err.field}`;
    return `${name}: invalid ${what}: ${err.message}`;
  }
  return `${name}: ${errorMessage(err)}`;
}

/**
 * Runs the provider and exits the process. Control pipe reads can keep the event loop
 * alive after a capture, so the process exits explicitly.
 */
export function launch(extcap: Extcap, listener: ExtcapListener, options?: RunOptions): void {
  extcap
    .run(listener, options)
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      const code = exitCodeFor(err);
      logError('Provider failed', {
        kind: err instanceof ExtcapError ? err.kind : undefined,
        error: errorMessage(err),
        exitCode: code,
      });
      process.stderr.write(formatFailure(extcap.config.name, err) + '\n');
      process.exit(code);
    });
}
