import type { PullMode, ResourceType } from '../common/constants';

export interface PullTaskPayload {
  jobId: string;
  shop: string;
  accessToken: string;
  resourceType: ResourceType;
  mode: PullMode;
  batchSize: number;
}

export interface ClaimedTask extends PullTaskPayload {
  taskId: number;
}

export interface QueueCounts {
  queued: number;
  claimed: number;
}

/**
 * Work queue between the API (producer) and worker processes (consumers).
 * A task is handed to one worker at a time; a claim that goes stale is handed out again.
 */
export abstract class TaskQueue {
  abstract enqueue(payload: PullTaskPayload): Promise<void>;

  /** Oldest claimable task, now owned by `workerId`, or null when the queue is empty */
  abstract claim(workerId: string): Promise<ClaimedTask | null>;

  /** Refreshes the claim so a long pull is not taken for a dead worker's; only the owner's claim moves */
  abstract heartbeat(taskId: number, workerId: string): Promise<void>;

  /** Marks the task done and drops its credential */
  abstract complete(taskId: number): Promise<void>;

  abstract counts(): Promise<QueueCounts>;

  /** Deletes done tasks, returning how many went */
  abstract purgeDone(): Promise<number>;
}
