import { createLogger } from '../logger.js';
import { ProgressReporter } from '../progress.js';
import { MailProvider } from '../providers/base.js';
import { MoveSummary, Session } from '../types.js';

const logger = createLogger('Mover');

export const MOVE_BATCH_SIZE = 50;

export function chunk<T>(values: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    batches.push(values.slice(i, i + size));
  }
  return batches;
}

/**
 * Move emails into `mailboxId`, one `Email/set` per batch, in order.
 * Ids the server reports as not updated are counted, not thrown.
 */
export async function moveInBatches(
  provider: MailProvider,
  session: Session,
  ids: string[],
  mailboxId: string,
  progress: ProgressReporter,
  batchSize = MOVE_BATCH_SIZE
): Promise<MoveSummary> {
  const summary: MoveSummary = { moved: 0, failed: 0, batches: 0 };

  try {
    for (const batch of chunk(ids, batchSize)) {
      const outcome = await provider.moveEmails(session, batch, mailboxId);
      summary.batches += 1;
      summary.moved += outcome.updated.length;

      const failures = Object.entries(outcome.notUpdated);
      if (failures.length > 0) {
        summary.failed += failures.length;
        progress.note(`  warning: ${failures.length} emails failed to move`);
        for (const [id, failure] of failures) {
          logger.warn(`Email ${id} not moved: ${failure.type}${failure.description ? ` (${failure.description})` : ''}`);
        }
      }

      progress.update(`  moved ${summary.moved}/${ids.length} emails...`);
    }
  } finally {
    progress.end();
  }
  return summary;
}
