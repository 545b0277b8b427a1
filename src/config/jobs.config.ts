import { registerAs } from '@nestjs/config';
import { BULK_MAX_POLLS, BULK_POLL_INTERVAL_MS, CLAIM_HEARTBEAT_INTERVAL_MS } from '../common/constants';

export default registerAs('jobs', () => ({
  resultTtlSeconds: parseInt(process.env.RESULT_TTL_SECONDS || '3600', 10),
  pollIntervalMs: parseInt(process.env.WORKER_POLL_INTERVAL_MS || '1000', 10),
  concurrency: parseInt(process.env.WORKER_CONCURRENCY || '3', 10),
  heartbeatIntervalMs: parseInt(
    process.env.WORKER_HEARTBEAT_INTERVAL_MS || String(CLAIM_HEARTBEAT_INTERVAL_MS),
    10,
  ),
  maxAttempts: parseInt(process.env.PULL_MAX_ATTEMPTS || '3', 10),
  retryDelayMs: parseInt(process.env.PULL_RETRY_DELAY_MS || '1000', 10),
  bulkPollIntervalMs: parseInt(process.env.BULK_POLL_INTERVAL_MS || String(BULK_POLL_INTERVAL_MS), 10),
  bulkMaxPolls: parseInt(process.env.BULK_MAX_POLLS || String(BULK_MAX_POLLS), 10),
}));
