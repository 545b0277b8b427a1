import { Logger } from '@nestjs/common';
import axios from 'axios';
import { Command, InvalidArgumentError } from 'commander';
import { isRecord } from '../common/json';
import { pollUntil, PollTimeoutError } from '../jobs/poll';

interface PullOptions {
  api: string;
  shop: string;
  token: string;
  mode: 'paginated' | 'bulk';
  batchSize: number;
  attempts: number;
  interval: number;
}

interface ChildStatus {
  state: string;
  itemCount?: number;
  error?: string;
}

const logger = new Logger('pull');

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function pullMode(value: string): PullOptions['mode'] {
  if (value !== 'paginated' && value !== 'bulk') {
    throw new InvalidArgumentError('Expected "paginated" or "bulk".');
  }
  return value;
}

async function readChildStatus(api: string, jobId: string): Promise<ChildStatus> {
  const response = await axios.get<unknown>(`${api}/api/data-pull/status/${jobId}`, {
    validateStatus: (status) => status === 200 || status === 404,
  });
  const body = response.data;
  if (response.status === 404 || !isRecord(body)) return { state: 'missing' };

  const { state, item_count: itemCount, error } = body;
  if (typeof state !== 'string') return { state: 'missing' };
  return {
    state,
    itemCount: typeof itemCount === 'number' ? itemCount : undefined,
    error: typeof error === 'string' ? error : undefined,
  };
}

async function run(options: PullOptions): Promise<void> {
  const api = options.api.replace(/\/+$/, '');

  const started = await axios.post<unknown>(`${api}/api/data-pull/start`, {
    shop: options.shop,
    access_token: options.token,
    mode: options.mode,
    batch_size: options.batchSize,
  });

  const body = isRecord(started.data) ? started.data : {};
  const children = isRecord(body.children) ? body.children : {};
  logger.log(`Started job ${String(body.job_id)} for ${options.shop}`);

  const outcomes = await Promise.all(
    Object.entries(children).map(async ([resource, childId]) => {
      const status = await pollUntil(
        () => readChildStatus(api, String(childId)),
        (s) => s.state === 'completed' || s.state === 'failed' || s.state === 'missing',
        { attempts: options.attempts, intervalMs: options.interval },
      );
      return { resource, childId: String(childId), status };
    }),
  );

  for (const { resource, childId, status } of outcomes) {
    if (status.state === 'completed') {
      logger.log(`${resource}: ${status.itemCount ?? 0} item(s), results under job ${childId}`);
    } else {
      logger.error(`${resource}: ${status.state}${status.error ? ` (${status.error})` : ''}`);
    }
  }

  if (outcomes.some((o) => o.status.state !== 'completed')) process.exitCode = 1;
}

const program = new Command()
  .name('pull')
  .description('Start a full data pull against a running API and wait for its three child jobs')
  .requiredOption('--shop <domain>', 'shop domain, e.g. demo.myshopify.com')
  .requiredOption('--token <token>', 'admin API access token', process.env.SHOPIFY_ACCESS_TOKEN)
  .option('--api <url>', 'base URL of the API', process.env.API_URL || 'http://localhost:8080')
  .option('--mode <mode>', 'paginated or bulk', pullMode, 'paginated')
  .option('--batch-size <n>', 'page size for paginated pulls', positiveInt, 100)
  .option('--attempts <n>', 'status polls per child before giving up', positiveInt, 120)
  .option('--interval <ms>', 'delay between status polls', positiveInt, 2000)
  .action(async () => {
    try {
      await run(program.opts<PullOptions>());
    } catch (error) {
      if (error instanceof PollTimeoutError) {
        logger.error(`Timed out waiting for the pull: ${error.message}`);
      } else {
        logger.error(error instanceof Error ? error.message : String(error));
      }
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
