import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { RetryPolicy } from './pagination/paginator.js';
import { silentProgress } from './progress.js';
import { MailProvider } from './providers/base.js';
import { collectTopSenders, formatUtcTimestamp } from './senders/top-senders.js';
import {
  describeForDryRun,
  findEmailsFromSender,
  moveEmailsToTrash,
} from './trash/trash-by-sender.js';

const logger = createLogger('MCP');

export const TOOLS: Tool[] = [
  {
    name: 'top_senders',
    description: 'Rank email senders by message count over a recent period (months are 30 days)',
    inputSchema: {
      type: 'object',
      properties: {
        count: { type: 'number', description: 'Number of top senders to return (default: 25)' },
        months: { type: 'number', description: 'How many months back to look (default: 6)' },
      },
    },
  },
  {
    name: 'trash_by_sender',
    description: 'Find all emails from a sender and move them to Trash. Dry run by default.',
    inputSchema: {
      type: 'object',
      properties: {
        sender: { type: 'string', description: 'Exact sender address' },
        dryRun: { type: 'boolean', description: 'List matches without moving them (default: true)' },
        limit: { type: 'number', description: 'Max emails to move, newest first (default: 0 = all)' },
      },
      required: ['sender'],
    },
  },
];

const topSendersArgs = z.object({
  count: z.number().int().min(1).default(25),
  months: z.number().int().min(1).default(6),
});

const trashBySenderArgs = z.object({
  sender: z.string().trim().min(1),
  dryRun: z.boolean().default(true),
  limit: z.number().int().min(0).default(0),
});

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolDeps {
  provider: MailProvider;
  retry?: Partial<RetryPolicy>;
}

function text(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

export async function callTool(deps: ToolDeps, name: string, args: unknown): Promise<ToolResult> {
  logger.info(`Tool: ${name}`);
  const { provider, retry } = deps;

  try {
    switch (name) {
      case 'top_senders': {
        const { count, months } = topSendersArgs.parse(args ?? {});
        const session = await provider.resolveSession();
        const report = await collectTopSenders(
          { provider, session, progress: silentProgress, retry },
          { count, months }
        );
        return text({
          since: formatUtcTimestamp(report.since),
          emailsScanned: report.emailsScanned,
          uniqueSenders: report.uniqueSenders,
          senders: report.senders.map((sender, index) => ({ rank: index + 1, ...sender })),
        });
      }

      case 'trash_by_sender': {
        const { sender, dryRun, limit } = trashBySenderArgs.parse(args ?? {});
        const session = await provider.resolveSession();
        const ctx = { provider, session, progress: silentProgress, retry };
        const found = await findEmailsFromSender(ctx, { sender, limit });

        if (dryRun || found.emails.length === 0) {
          return text({
            sender,
            found: found.emails.length,
            dryRun,
            emails: found.emails.map(describeForDryRun),
          });
        }

        const report = await moveEmailsToTrash({ ...ctx, session: found.session }, found.emails);
        return text({
          sender,
          found: found.emails.length,
          dryRun,
          moved: report.moved,
          failed: report.failed,
        });
      }

      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    logger.error(`Error:`, error);
    const message = error instanceof z.ZodError ? `Invalid arguments: ${formatIssues(error)}` : errorMessage(error);
    return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
}

export function createServer(deps: ToolDeps): Server {
  const server = new Server(
    { name: 'mail-sweep', version: '1.0.0' },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(deps, request.params.name, request.params.arguments)
  );

  return server;
}
