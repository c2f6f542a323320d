import { createLogger } from '@tubeveil/logger';
import type { EngineConfig } from '../config/engine-config.js';
import { SessionController } from '../session/session-controller.js';
import { BrowserLaunchError, errorMessage } from '../utils/errors.js';
import { printJson } from '../utils/json.js';

const logger = createLogger('cli');

const CANCELLED_MESSAGE = 'Operation cancelled by user';

type WritableLike = { write: (chunk: string) => unknown };

type SignalSource = {
  once: (event: 'SIGINT', listener: () => void) => unknown;
  off: (event: 'SIGINT', listener: () => void) => unknown;
};

type WithSessionOptions = {
  pretty: boolean;
  createController?: (config: EngineConfig) => SessionController;
  signals?: SignalSource;
  stderr?: WritableLike;
};

/**
 * Runs one CLI action against a started session and always closes it. An
 * interrupt, a browser that fails to launch or any escaped error ends with a
 * JSON diagnostic on stderr and exit code 1.
 */
export async function withSession(
  config: EngineConfig,
  options: WithSessionOptions,
  run: (controller: SessionController) => Promise<number>,
): Promise<number> {
  const {
    pretty,
    createController = (engineConfig) => new SessionController(engineConfig),
    signals = process,
    stderr = process.stderr,
  } = options;

  let interrupt: () => void = () => undefined;
  const interrupted = new Promise<'interrupted'>((resolve) => {
    interrupt = () => resolve('interrupted');
  });
  const onSigint = () => {
    logger.warn('Interrupted, closing the session');
    interrupt();
  };
  signals.once('SIGINT', onSigint);

  const controller = createController(config);
  const startTime = Date.now();

  try {
    if ((await Promise.race([controller.start(), interrupted])) === 'interrupted') {
      printJson({ error: CANCELLED_MESSAGE }, pretty, stderr);
      return 1;
    }

    const outcome = await Promise.race([run(controller), interrupted]);
    if (outcome === 'interrupted') {
      printJson({ error: CANCELLED_MESSAGE }, pretty, stderr);
      return 1;
    }

    logger.info(`Execution finished in ${Date.now() - startTime}ms`);
    return outcome;
  } catch (error) {
    const message =
      error instanceof BrowserLaunchError ? error.message : `Unexpected error: ${errorMessage(error)}`;
    printJson({ error: message }, pretty, stderr);
    return 1;
  } finally {
    signals.off('SIGINT', onSigint);
    await controller.close();
  }
}

export { CANCELLED_MESSAGE };
export type { SignalSource, WithSessionOptions, WritableLike };
