import type { Logger } from 'pino';
import type { IngestionLoop, IngestionOutcome } from './ingestion-loop.js';

/**
 * What to do when ingestion fails.
 *
 * - `exit`: treat it as process-fatal (hand the error to `onFatal`).
 * - `degrade`: keep serving the events already retained, without updates.
 */
export type FailurePolicy = 'exit' | 'degrade';

export interface SupervisorOptions {
  loop: Pick<IngestionLoop, 'run'>;
  signal: AbortSignal;
  policy: FailurePolicy;
  log: Logger;
  onFatal: (error: Error) => void;
}

/**
 * Runs the ingestion loop to completion and applies the failure policy.
 * Resolves with the loop's outcome once the policy has been applied.
 */
export async function superviseIngestion(options: SupervisorOptions): Promise<IngestionOutcome> {
  const { log } = options;
  const outcome = await options.loop.run(options.signal);

  if (outcome.state === 'closed') {
    log.info('Ingestion finished');
    return outcome;
  }

  if (options.policy === 'degrade') {
    log.error(
      { err: outcome.error },
      'Ingestion failed; serving retained events without updates',
    );
    return outcome;
  }

  log.fatal({ err: outcome.error }, 'Ingestion failed');
  options.onFatal(outcome.error);
  return outcome;
}
