import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { STALE_CLAIM_SECONDS } from '../common/constants';
import { PullTaskEntity } from './entities/pull-task.entity';
import { ClaimedTask, PullTaskPayload, QueueCounts, TaskQueue } from './task-queue';

@Injectable()
export class TypeOrmTaskQueue extends TaskQueue {
  private readonly logger = new Logger(TypeOrmTaskQueue.name);

  constructor(
    @InjectRepository(PullTaskEntity)
    private readonly taskRepo: Repository<PullTaskEntity>,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  async enqueue(payload: PullTaskPayload): Promise<void> {
    await this.taskRepo.insert({
      job_id: payload.jobId,
      shop_domain: payload.shop,
      access_token: payload.accessToken,
      resource_type: payload.resourceType,
      mode: payload.mode,
      batch_size: payload.batchSize,
      status: 'queued',
    });
  }

  claim(workerId: string): Promise<ClaimedTask | null> {
    return this.dataSource.transaction(async (manager) => {
      const staleBefore = new Date(Date.now() - STALE_CLAIM_SECONDS * 1000);

      // SKIP LOCKED: concurrent workers each get a different row
      const task = await manager
        .getRepository(PullTaskEntity)
        .createQueryBuilder('task')
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .where('task.status = :queued', { queued: 'queued' })
        .orWhere('(task.status = :claimed AND task.claimed_at < :staleBefore)', {
          claimed: 'claimed',
          staleBefore,
        })
        .orderBy('task.created_at', 'ASC')
        .addOrderBy('task.id', 'ASC')
        .getOne();

      if (!task) return null;

      if (task.status === 'claimed') {
        this.logger.warn(`Reclaiming stale task ${task.id} (job ${task.job_id}) from ${task.claimed_by}`);
      }

      task.status = 'claimed';
      task.claimed_by = workerId;
      task.claimed_at = new Date();
      await manager.save(task);

      return {
        taskId: task.id,
        jobId: task.job_id,
        shop: task.shop_domain,
        accessToken: task.access_token,
        resourceType: task.resource_type,
        mode: task.mode,
        batchSize: task.batch_size,
      };
    });
  }

  async heartbeat(taskId: number, workerId: string): Promise<void> {
    const result = await this.taskRepo.update(
      { id: taskId, status: 'claimed', claimed_by: workerId },
      { claimed_at: new Date() },
    );
    if (result.affected === 0) {
      this.logger.warn(`Task ${taskId} is no longer claimed by ${workerId}`);
    }
  }

  async complete(taskId: number): Promise<void> {
    await this.taskRepo.update({ id: taskId }, { status: 'done', access_token: '' });
  }

  async counts(): Promise<QueueCounts> {
    const [queued, claimed] = await Promise.all([
      this.taskRepo.count({ where: { status: 'queued' } }),
      this.taskRepo.count({ where: { status: 'claimed' } }),
    ]);
    return { queued, claimed };
  }

  async purgeDone(): Promise<number> {
    const result = await this.taskRepo.delete({ status: 'done' });
    return result.affected ?? 0;
  }
}
