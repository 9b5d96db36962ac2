import { IJobStore, ILogger, IRetentionPolicy } from '../interfaces/services';
import { JobRecord } from '../types/domain';
import { isTerminal } from '../repositories/transitionRules';

// Evicts finished jobs once they are older than maxAgeMs. Jobs whose
// callback is still being delivered are kept.
export class MaxAgeRetentionPolicy implements IRetentionPolicy {
  constructor(private maxAgeMs: number) {}

  shouldEvict(record: JobRecord, now: Date): boolean {
    if (!isTerminal(record.state) || record.delivery.status === 'pending') {
      return false;
    }
    return now.getTime() - record.updatedAt.getTime() >= this.maxAgeMs;
  }
}

// Periodically applies a retention policy to the job store
export class RetentionSweeper {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private jobStore: IJobStore,
    private policy: IRetentionPolicy,
    private logger: ILogger,
    private intervalMs: number,
    private now: () => Date = () => new Date()
  ) {}

  async sweep(): Promise<number> {
    const now = this.now();
    const candidates = await this.jobStore.listTerminal();
    let evicted = 0;

    for (const record of candidates) {
      if (this.policy.shouldEvict(record, now) && await this.jobStore.delete(record.jobId)) {
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.info('Evicted finished jobs', { evicted, scanned: candidates.length });
    }
    return evicted;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      this.sweep().catch(error => {
        this.logger.error('Job retention sweep failed:', error);
      });
    }, this.intervalMs);
    this.timer.unref();

    this.logger.info('Job retention sweeper started', { intervalMs: this.intervalMs });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
