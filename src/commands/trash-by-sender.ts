import { StreamProgress } from '../progress.js';
import {
  findEmailsFromSender,
  formatDryRun,
  moveEmailsToTrash,
} from '../trash/trash-by-sender.js';
import { CommandDeps } from './run.js';

export interface TrashCommandOptions {
  sender: string;
  dryRun: boolean;
  limit: number;
}

export async function runTrashBySender(
  deps: CommandDeps,
  options: TrashCommandOptions
): Promise<number> {
  const { provider, stdout, stderr } = deps;
  const { sender } = options;
  const progress = new StreamProgress(stderr);

  const session = await provider.resolveSession();

  stderr.write(`Finding emails from ${sender}...\n`);
  const found = await findEmailsFromSender(
    { provider, session, progress, retry: deps.retry },
    { sender, limit: options.limit }
  );

  if (found.emails.length === 0) {
    stderr.write('No emails found.\n');
    return 0;
  }

  const count = found.emails.length;
  stderr.write(`Found ${count} email(s) from ${sender}.\n`);

  if (options.dryRun) {
    for (const line of formatDryRun(found.emails)) {
      stdout.write(`${line}\n`);
    }
    stderr.write(`\n  ${count} email(s) would be moved to Trash.\n`);
    return 0;
  }

  const report = await moveEmailsToTrash(
    { provider, session: found.session, progress, retry: deps.retry },
    found.emails
  );

  stdout.write(`Moved ${report.moved} email(s) from ${sender} to Trash.\n`);
  if (report.failed > 0) {
    stderr.write(`  ${report.failed} email(s) could not be moved.\n`);
  }
  return 0;
}
