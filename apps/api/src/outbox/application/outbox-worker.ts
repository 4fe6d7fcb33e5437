import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { WorkflowSettings } from '@platform/application/workflow-settings';
import { OutboxDispatcher } from './outbox-dispatcher';

/** Polls the outbox and retries tasks left pending after their first dispatch. */
@Injectable()
export class OutboxWorker implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(OutboxWorker.name);
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly dispatcher: OutboxDispatcher,
    private readonly settings: WorkflowSettings
  ) {}

  onApplicationBootstrap(): void {
    const interval = this.settings.outboxPollIntervalMs;
    if (interval <= 0) {
      this.logger.log('Outbox polling disabled');
      return;
    }
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error(
          'Outbox poll failed',
          error instanceof Error ? error.stack : String(error)
        );
      });
    }, interval);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** One poll; skipped while the previous one is still running. */
  async tick(): Promise<void> {
    if (this.running) return;
    this.running = true;
    try {
      const summary = await this.dispatcher.drainPending();
      if (summary.succeeded.length > 0 || summary.failed.length > 0) {
        this.logger.log(
          `Outbox: ${summary.succeeded.length} done, ${summary.failed.length} failed`
        );
      }
    } finally {
      this.running = false;
    }
  }
}
