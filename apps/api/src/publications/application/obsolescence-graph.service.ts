import { Injectable, Logger } from '@nestjs/common';
import { streamingUrls, wouldCreateObsoletionCycle } from '@tasflow/domain';
import { VideoSync } from '@collaborators/application/ports/video-sync';
import {
  NotFoundError,
  PreconditionFailedError,
} from '@platform/application/errors';
import {
  OperationResult,
  runOperation,
} from '@platform/application/operation-result';
import {
  WorkflowUnitOfWork,
  type WorkflowScope,
} from '@platform/application/workflow-unit-of-work';
import { OutboxDispatcher } from '@outbox/application/outbox-dispatcher';

@Injectable()
export class ObsolescenceGraphService {
  private readonly logger = new Logger(ObsolescenceGraphService.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly videoSync: VideoSync,
    private readonly dispatcher: OutboxDispatcher
  ) {}

  /**
   * Marks `toObsoleteId` as obsoleted by `obsoletingId` and returns true, or
   * false when the publication to obsolete does not exist. Each recognized
   * streaming URL of the obsoleted publication gets its own re-sync.
   */
  obsoleteWith(
    toObsoleteId: number,
    obsoletingId: number
  ): Promise<OperationResult<boolean>> {
    return runOperation(this.logger, 'ObsoleteWith', async () => {
      const taskIds = await this.unitOfWork.transaction((scope) =>
        this.obsoleteWithin(scope, toObsoleteId, obsoletingId)
      );
      if (taskIds === null) {
        return false;
      }
      await this.dispatcher.dispatchAfterCommit(taskIds);
      return true;
    });
  }

  /**
   * Transactional part of obsoletion, shared with publishing. Returns the
   * enqueued re-sync task ids, or null when the target does not exist.
   */
  async obsoleteWithin(
    scope: WorkflowScope,
    toObsoleteId: number,
    obsoletingId: number
  ): Promise<number[] | null> {
    const target = await scope.publications.findById(toObsoleteId);
    if (!target) {
      return null;
    }
    if (toObsoleteId === obsoletingId) {
      throw new PreconditionFailedError('A publication cannot obsolete itself');
    }

    const obsoleting = await scope.publications.findById(obsoletingId);
    if (!obsoleting) {
      throw new NotFoundError('Obsoleting publication not found');
    }
    if (obsoleting.gameId !== target.gameId) {
      throw new PreconditionFailedError(
        'Only a publication of the same game can obsolete another'
      );
    }

    const links = await scope.publications.obsoletionLinks(target.gameId);
    if (
      wouldCreateObsoletionCycle(
        toObsoleteId,
        obsoletingId,
        (id) => links.get(id) ?? null
      )
    ) {
      throw new PreconditionFailedError(
        `Obsoleting ${toObsoleteId} with ${obsoletingId} would create a cycle`
      );
    }

    await scope.publications.setObsoletedBy(toObsoleteId, obsoletingId);

    const taskIds: number[] = [];
    for (const url of streamingUrls(target.urls)) {
      if (!this.videoSync.isRecognizedUrl(url.url)) continue;
      taskIds.push(
        await scope.outbox.enqueue({
          kind: 'video_sync',
          publicationId: toObsoleteId,
          url: url.url,
        })
      );
    }
    return taskIds;
  }
}
