// src/cli/run.ts
import { loadConfig } from '../core/config/env.js';
import { SyncError, describeError } from '../core/errors.js';
import { HourlyFileSink, logger } from '../core/logger.js';
import { Runtime } from '../core/runtime.js';

export type GlobalOptions = {
  verbose?: boolean;
};

export type RuntimeFactory = () => Runtime;

function defaultRuntime(): Runtime {
  return new Runtime(loadConfig());
}

export function reportError(error: unknown): void {
  logger.error('cli', describeError(error));
  if (error instanceof SyncError && error.suggestion) {
    logger.error('cli', `Suggestion: ${error.suggestion}`);
  }
}

/**
 * Wraps a command body with config loading, banners and teardown.
 * `body` resolves `false` for an aborted run; the process then exits 1.
 */
export async function runCommand(
  title: string,
  options: GlobalOptions,
  body: (runtime: Runtime) => Promise<boolean>,
  createRuntime: RuntimeFactory = defaultRuntime
): Promise<void> {
  logger.banner('cli', `${title} started`);

  let runtime: Runtime;
  try {
    runtime = createRuntime();
  } catch (error) {
    reportError(error);
    logger.banner('cli', `${title} failed`);
    process.exit(1);
  }
  logger.setLevel(options.verbose ? 'debug' : runtime.config.logLevel);
  if (runtime.config.logDir) {
    logger.setFileSink(new HourlyFileSink(runtime.config.logDir));
  }

  let succeeded = false;
  try {
    succeeded = await body(runtime);
  } catch (error) {
    reportError(error);
  } finally {
    await runtime.close();
    logger.banner('cli', `${title} ${succeeded ? 'finished' : 'failed'}`);
  }

  if (!succeeded) {
    process.exit(1);
  }
}
