import { RESOURCE_TYPES, ResourceType } from '../common/constants';
import { isRecord } from '../common/json';

export const JOB_STATES = ['pending', 'running', 'completed', 'failed'] as const;
export type JobState = (typeof JOB_STATES)[number];

export const JOB_KINDS = ['bulk-pull', 'resource-pull'] as const;
export type JobKind = (typeof JOB_KINDS)[number];

export type ChildJobs = Partial<Record<ResourceType, string>>;

export interface JobStatus {
  jobId: string;
  kind: JobKind;
  state: JobState;
  /** Shop domain the job pulls from */
  tenant: string;
  resourceType?: ResourceType;
  children?: ChildJobs;
  itemCount?: number;
  error?: string;
  createdAt: string;
  updatedAt: string;
}

/** What a results poller gets back */
export type ResultLookup =
  | { status: 'ready'; jobId: string; data: unknown[] }
  | { status: 'pending'; jobId: string; state: JobState }
  | { status: 'failed'; jobId: string; error: string }
  | { status: 'missing'; reason: string };

export function isResourceType(value: unknown): value is ResourceType {
  return RESOURCE_TYPES.some((r) => r === value);
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((v) => v === value);
}

function isChildJobs(value: unknown): value is ChildJobs {
  if (!isRecord(value)) return false;
  return Object.entries(value).every(([k, v]) => isResourceType(k) && typeof v === 'string');
}

/** Narrows a value read back from the cache */
export function isJobStatus(value: unknown): value is JobStatus {
  if (!isRecord(value)) return false;
  const { jobId, kind, state, tenant, resourceType, children, itemCount, error, createdAt, updatedAt } =
    value;

  return (
    typeof jobId === 'string' &&
    isOneOf(JOB_KINDS, kind) &&
    isOneOf(JOB_STATES, state) &&
    typeof tenant === 'string' &&
    typeof createdAt === 'string' &&
    typeof updatedAt === 'string' &&
    (resourceType === undefined || isResourceType(resourceType)) &&
    (children === undefined || isChildJobs(children)) &&
    (itemCount === undefined || typeof itemCount === 'number') &&
    (error === undefined || typeof error === 'string')
  );
}
