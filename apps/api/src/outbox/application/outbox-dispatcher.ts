import { Injectable, Logger } from '@nestjs/common';
import { orderedAuthorNames, publicationWikiPageName } from '@tasflow/domain';
import { AutomationAgent } from '@collaborators/application/ports/automation-agent';
import { RoleGrantor } from '@collaborators/application/ports/role-grantor';
import { VideoSync } from '@collaborators/application/ports/video-sync';
import { Clock } from '@platform/application/clock';
import { NotFoundError } from '@platform/application/errors';
import { executeWithRetry } from '@platform/application/retry';
import { WorkflowSettings } from '@platform/application/workflow-settings';
import { WorkflowUnitOfWork } from '@platform/application/workflow-unit-of-work';
import type { OutboxTask, OutboxTaskPayload } from '../domain/outbox-task';

export type DispatchSummary = Readonly<{
  succeeded: readonly number[];
  failed: readonly number[];
}>;

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Runs outbox tasks against the downstream collaborators. Each task succeeds
 * or fails on its own; a failure is recorded on the task and never stops the
 * remaining ones.
 */
@Injectable()
export class OutboxDispatcher {
  private readonly logger = new Logger(OutboxDispatcher.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly settings: WorkflowSettings,
    private readonly videoSync: VideoSync,
    private readonly automationAgent: AutomationAgent,
    private readonly roleGrantor: RoleGrantor,
    private readonly clock: Clock
  ) {}

  /**
   * Runs the given tasks if they are still pending. A task claimed by another
   * dispatch or drain in the meantime is skipped.
   */
  async dispatch(taskIds: readonly number[]): Promise<DispatchSummary> {
    if (taskIds.length === 0) {
      return { succeeded: [], failed: [] };
    }
    const tasks = await this.unitOfWork
      .current()
      .outbox.claim(taskIds, this.clock.now());
    return this.run(tasks);
  }

  /**
   * Post-commit dispatch. Failed tasks stay in the outbox for the worker; the
   * committed change is never reported as failed because of them.
   */
  async dispatchAfterCommit(taskIds: readonly number[]): Promise<void> {
    try {
      const summary = await this.dispatch(taskIds);
      if (summary.failed.length > 0) {
        this.logger.warn(
          `${summary.failed.length} outbox task(s) left pending for retry`
        );
      }
    } catch (error) {
      this.logger.error(
        `Post-commit dispatch of tasks ${taskIds.join(', ')} failed: ${errorMessage(error)}`
      );
    }
  }

  /**
   * Runs one batch of the oldest pending tasks, together with running tasks
   * whose lease has expired.
   */
  async drainPending(): Promise<DispatchSummary> {
    const now = this.clock.now();
    const tasks = await this.unitOfWork
      .current()
      .outbox.claimPending(
        this.settings.outboxBatchSize,
        now,
        new Date(now.getTime() - this.settings.outboxLeaseMs)
      );
    return this.run(tasks);
  }

  private async run(tasks: readonly OutboxTask[]): Promise<DispatchSummary> {
    const succeeded: number[] = [];
    const failed: number[] = [];
    const outbox = this.unitOfWork.current().outbox;

    for (const task of tasks) {
      try {
        await this.handle(task.payload);
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn(
          `Outbox task ${task.id} (${task.payload.kind}) failed on attempt ${task.attempts}: ${message}`
        );
        await this.record(task.id, () =>
          outbox.recordFailure(task.id, message, this.settings.outboxMaxAttempts)
        );
        failed.push(task.id);
        continue;
      }
      await this.record(task.id, () => outbox.markDone(task.id));
      succeeded.push(task.id);
    }

    return { succeeded, failed };
  }

  private async record(
    taskId: number,
    write: () => Promise<void>
  ): Promise<void> {
    try {
      const outcome = await executeWithRetry(write);
      if (!outcome.success) {
        this.logger.error(
          `Gave up recording the outcome of outbox task ${taskId} after repeated conflicts`
        );
      }
    } catch (error) {
      this.logger.error(
        `Could not record the outcome of outbox task ${taskId}: ${errorMessage(error)}`
      );
    }
  }

  private async handle(payload: OutboxTaskPayload): Promise<void> {
    switch (payload.kind) {
      case 'video_sync':
        return this.syncVideo(payload.publicationId, payload.url);
      case 'grant_publication_roles':
        return this.roleGrantor.assignAutoAssignableRolesByPublication(
          payload.authorIds,
          payload.publicationTitle
        );
      case 'notify_publication':
        return this.automationAgent.postSubmissionPublished(
          payload.submissionId,
          payload.publicationId
        );
      case 'notify_dormant':
        return this.automationAgent.postSubmissionDormant(
          payload.submissionId,
          payload.status
        );
      default: {
        const unhandled: never = payload;
        throw new Error(`Unhandled outbox task ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async syncVideo(publicationId: number, url: string): Promise<void> {
    const scope = this.unitOfWork.current();
    const publication = await scope.publications.findById(publicationId);
    if (!publication) {
      throw new NotFoundError(`Publication ${publicationId} not found`);
    }
    const [system, game, page] = await Promise.all([
      scope.systems.findSystemById(publication.systemId),
      scope.games.findGame(publication.gameId),
      scope.wiki.page(publicationWikiPageName(publicationId)),
    ]);
    const watchUrl = publication.urls.find((entry) => entry.url === url);

    await this.videoSync.sync({
      publicationId,
      url,
      displayName: watchUrl?.displayName ?? null,
      title: publication.title,
      description: page?.markup ?? null,
      systemCode: system?.code ?? '',
      gameDisplayName: game?.displayName ?? '',
      authorNames: orderedAuthorNames(publication.authors),
      publishedAt: publication.createdAt,
      obsoletedById: publication.obsoletedById,
    });
  }
}
