import { Injectable, Logger } from '@nestjs/common';
import {
  buildPublicationUrls,
  canPublish,
  generatePublicationTitle,
  orderedAuthorNames,
  publicationWikiPageName,
  streamingUrls,
  type Actor,
  type NewPublication,
  type PublishableSubmission,
} from '@tasflow/domain';
import { VideoSync } from '@collaborators/application/ports/video-sync';
import { Clock } from '@platform/application/clock';
import {
  ConcurrencyConflictError,
  NotFoundError,
  PreconditionFailedError,
  ValidationFailedError,
  WorkflowError,
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
import { ObsolescenceGraphService } from './obsolescence-graph.service';

export type PublishRequest = Readonly<{
  submissionId: number;
  /** File name without extension; the submission's movie extension is appended. */
  movieFilename: string;
  /** Markup of the publication's wiki page. */
  markup: string;
  onlineWatchingUrl: string;
  alternateOnlineWatchingUrl?: string | null;
  alternateOnlineWatchUrlName?: string | null;
  mirrorSiteUrl?: string | null;
  movieToObsolete?: number | null;
  selectedFlags?: readonly number[];
  selectedTags?: readonly number[];
}>;

export type PublishOutcome = Readonly<{
  publicationId: number;
  publicationTitle: string;
}>;

export type ObsoletePublicationTags = Readonly<{
  title: string;
  tagIds: readonly number[];
  markup: string | null;
}>;

@Injectable()
export class SubmissionPublicationService {
  private readonly logger = new Logger(SubmissionPublicationService.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly obsolescence: ObsolescenceGraphService,
    private readonly dispatcher: OutboxDispatcher,
    private readonly videoSync: VideoSync,
    private readonly clock: Clock
  ) {}

  /**
   * Turns a claimed, catalogued submission into a publication in one
   * transaction. Downstream syncs are enqueued in that transaction and
   * dispatched after it commits.
   */
  publish(
    request: PublishRequest,
    actor: Actor
  ): Promise<OperationResult<PublishOutcome>> {
    return runOperation(this.logger, 'Publish', async () => {
      if (!actor.permissions.has('publish_movies')) {
        throw new PreconditionFailedError(
          'Publishing requires the publish_movies permission'
        );
      }
      const movieFilename = request.movieFilename.trim();
      if (!movieFilename) {
        throw new ValidationFailedError('A movie filename is required');
      }
      if (!request.onlineWatchingUrl.trim()) {
        throw new ValidationFailedError('An online watching url is required');
      }

      const scope = this.unitOfWork.current();
      const submission = await scope.submissions.findById(request.submissionId);
      if (!submission) {
        throw new NotFoundError('Submission not found');
      }
      if (!canPublish(submission)) {
        throw new PreconditionFailedError(
          'Submission is not ready to be published'
        );
      }

      const fileName = `${movieFilename}.${submission.movieExtension}`;
      if (await scope.publications.movieFileNameExists(fileName)) {
        throw new PreconditionFailedError(
          `Movie filename ${fileName} already exists`
        );
      }

      if (request.movieToObsolete != null) {
        const target = await scope.publications.findById(request.movieToObsolete);
        if (!target) {
          throw new NotFoundError('Publication to obsolete not found');
        }
        if (target.gameId !== submission.gameId) {
          throw new PreconditionFailedError(
            'Only a publication of the same game can be obsoleted'
          );
        }
      }

      let published: { outcome: PublishOutcome; taskIds: number[] };
      try {
        published = await this.unitOfWork.transaction((trx) =>
          this.publishWithin(trx, submission, request, fileName, actor)
        );
      } catch (error) {
        if (error instanceof ConcurrencyConflictError) {
          throw new PreconditionFailedError(
            'Submission changed while publishing',
            error
          );
        }
        throw error instanceof WorkflowError
          ? error
          : new PreconditionFailedError('Unable to publish', error);
      }

      this.logger.log(
        `${actor.userName} published submission ${submission.id} as publication ${published.outcome.publicationId}`
      );
      await this.dispatcher.dispatchAfterCommit(published.taskIds);
      return published.outcome;
    });
  }

  /**
   * Title, tags and wiki markup of a publication about to be obsoleted, to
   * pre-fill the publication that replaces it. Null when it does not exist.
   */
  obsoletePublicationTags(
    publicationId: number
  ): Promise<OperationResult<ObsoletePublicationTags | null>> {
    return runOperation(this.logger, 'ObsoletePublicationTags', async () => {
      const scope = this.unitOfWork.current();
      const publication = await scope.publications.findById(publicationId);
      if (!publication) {
        return null;
      }
      const page = await scope.wiki.page(publicationWikiPageName(publicationId));
      return {
        title: publication.title,
        tagIds: publication.tagIds,
        markup: page?.markup ?? null,
      };
    });
  }

  private async publishWithin(
    scope: WorkflowScope,
    submission: PublishableSubmission,
    request: PublishRequest,
    fileName: string,
    actor: Actor
  ): Promise<{ outcome: PublishOutcome; taskIds: number[] }> {
    const movieFileId = await scope.movieFiles.copy(
      submission.movieFileId,
      fileName
    );

    const urls = buildPublicationUrls({
      onlineWatchingUrl: request.onlineWatchingUrl.trim(),
      alternateOnlineWatchingUrl: request.alternateOnlineWatchingUrl,
      alternateOnlineWatchUrlName: request.alternateOnlineWatchUrlName,
      mirrorSiteUrl: request.mirrorSiteUrl,
    });

    const draft: NewPublication = {
      submissionId: submission.id,
      publicationClassId: submission.intendedClassId,
      systemId: submission.systemId,
      systemFrameRateId: submission.systemFrameRateId,
      gameId: submission.gameId,
      gameVersionId: submission.gameVersionId,
      gameGoalId: submission.gameGoalId,
      emulatorVersion: submission.emulatorVersion,
      frames: submission.frames,
      rerecordCount: submission.rerecordCount,
      movieFileName: fileName,
      movieFileId,
      additionalAuthors: submission.additionalAuthors,
      obsoletedById: null,
      authors: submission.authors.map((author) => ({ ...author })),
      flagIds: [...(request.selectedFlags ?? [])],
      tagIds: [...(request.selectedTags ?? [])],
      urls,
    };

    // The title embeds the id, so it is set after the first save.
    const publicationId = await scope.publications.insert(
      draft,
      submission.title
    );

    const system = await scope.systems.findSystemById(submission.systemId);
    const frameRate = await scope.systems.findFrameRateById(
      submission.systemFrameRateId
    );
    const game = await scope.games.findGame(submission.gameId);
    const goal = await scope.games.findGoal(submission.gameGoalId);
    if (!system || !frameRate || !game || !goal) {
      throw new PreconditionFailedError(
        'Submission references catalog entries that no longer exist'
      );
    }

    const title = generatePublicationTitle({
      id: publicationId,
      systemCode: system.code,
      gameDisplayName: game.displayName,
      goal: goal.displayName,
      authorNames: orderedAuthorNames(draft.authors),
      additionalAuthors: draft.additionalAuthors,
      frames: draft.frames,
      frameRate: frameRate.frameRate,
    });
    await scope.publications.setTitle(publicationId, title);

    const authorId = actor.userId.unwrap();
    await scope.wiki.add({
      pageName: publicationWikiPageName(publicationId),
      markup: request.markup,
      authorId,
      revisionMessage: `Auto-generated from Movie #${publicationId}`,
    });

    await scope.statusHistory.append({
      submissionId: submission.id,
      status: submission.status,
      createdAt: this.clock.now(),
    });
    await scope.submissions.update(
      { ...submission, status: 'published' },
      submission.version
    );

    const taskIds: number[] = [];
    if (request.movieToObsolete != null) {
      const resyncs = await this.obsolescence.obsoleteWithin(
        scope,
        request.movieToObsolete,
        publicationId
      );
      if (resyncs === null) {
        throw new NotFoundError('Publication to obsolete not found');
      }
      taskIds.push(...resyncs);
    }

    taskIds.push(
      await scope.outbox.enqueue({
        kind: 'grant_publication_roles',
        authorIds: draft.authors.map((author) => author.userId),
        publicationTitle: title,
      }),
      await scope.outbox.enqueue({
        kind: 'notify_publication',
        submissionId: submission.id,
        publicationId,
      })
    );
    for (const url of streamingUrls(urls)) {
      if (!this.videoSync.isRecognizedUrl(url.url)) continue;
      taskIds.push(
        await scope.outbox.enqueue({
          kind: 'video_sync',
          publicationId,
          url: url.url,
        })
      );
    }

    return { outcome: { publicationId, publicationTitle: title }, taskIds };
  }
}
