import { Injectable, Logger } from '@nestjs/common';
import {
  generateSubmissionTitle,
  isDormant,
  isWorkInProgress,
  judgeIsClaiming,
  judgeIsUnclaiming,
  normalizeCsv,
  publisherIsClaiming,
  publisherIsUnclaiming,
  submissionWikiPageName,
  type Actor,
  type NewSubmission,
  type Submission,
  type SubmissionAuthor,
  type SubmissionStatus,
} from '@tasflow/domain';
import { VideoSync } from '@collaborators/application/ports/video-sync';
import {
  MovieFileIngestService,
  type MovieUpload,
  type PreparedMovie,
} from '@movies/application/movie-file-ingest.service';
import { OutboxDispatcher } from '@outbox/application/outbox-dispatcher';
import { Clock } from '@platform/application/clock';
import {
  ConcurrencyConflictError,
  NotFoundError,
  PreconditionFailedError,
  ValidationFailedError,
} from '@platform/application/errors';
import {
  OperationResult,
  runOperation,
} from '@platform/application/operation-result';
import { executeWithRetry } from '@platform/application/retry';
import { WorkflowSettings } from '@platform/application/workflow-settings';
import {
  WorkflowUnitOfWork,
  type WorkflowScope,
} from '@platform/application/workflow-unit-of-work';
import { SubmissionAuthorizationService } from './submission-authorization.service';

export type SubmitRequest = Readonly<{
  movie: MovieUpload;
  gameName: string;
  romName?: string | null;
  gameVersion?: string | null;
  goalName?: string | null;
  emulator?: string | null;
  encodeEmbedLink?: string | null;
  /** User names in author order. */
  authors: readonly string[];
  externalAuthors?: string | null;
  markup: string;
  isEventSubmission?: boolean;
}>;

export type SubmitOutcome = Readonly<{ id: number; title: string }>;

export type UpdateSubmissionRequest = Readonly<{
  submissionId: number;
  status: SubmissionStatus;
  replaceMovie?: MovieUpload | null;
  intendedClassId?: number | null;
  rejectionReasonId?: number | null;
  gameName: string;
  gameVersion?: string | null;
  romName?: string | null;
  goal?: string | null;
  emulator?: string | null;
  encodeEmbedLink?: string | null;
  gameId?: number | null;
  gameVersionId?: number | null;
  gameGoalId?: number | null;
  authors: readonly string[];
  externalAuthors?: string | null;
  markupChanged?: boolean;
  markup?: string | null;
  revisionMessage?: string | null;
  minorEdit?: boolean;
}>;

export type UpdateSubmissionOutcome = Readonly<{
  previousStatus: SubmissionStatus;
  title: string;
}>;

type CatalogSelection = Readonly<{
  gameId: number | null;
  gameVersionId: number | null;
  gameGoalId: number | null;
  intendedClassId: number | null;
}>;

const blankToNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

const stripQuotes = (value: string | null | undefined): string | null =>
  blankToNull(value?.replace(/^"+|"+$/g, ''));

@Injectable()
export class SubmissionService {
  private readonly logger = new Logger(SubmissionService.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly ingest: MovieFileIngestService,
    private readonly authorization: SubmissionAuthorizationService,
    private readonly dispatcher: OutboxDispatcher,
    private readonly videoSync: VideoSync,
    private readonly settings: WorkflowSettings,
    private readonly clock: Clock
  ) {}

  submit(
    request: SubmitRequest,
    actor: Actor
  ): Promise<OperationResult<SubmitOutcome>> {
    return runOperation(this.logger, 'Submit', async () => {
      if (!actor.permissions.has('submit_movies')) {
        throw new PreconditionFailedError(
          'Submitting requires the submit_movies permission'
        );
      }
      const gameName = blankToNull(request.gameName);
      if (!gameName) {
        throw new ValidationFailedError('A game name is required');
      }
      const externalAuthors = normalizeCsv(request.externalAuthors ?? null);
      if (request.authors.length === 0 && !externalAuthors) {
        throw new ValidationFailedError('At least one author is required');
      }

      // Frame-rate find-or-create may race; keep it out of the transaction.
      const prepared = await this.ingest.prepare(request.movie);
      const { mapped } = prepared;

      const outcome = await this.unitOfWork.transaction(async (scope) => {
        const authors = await this.resolveAuthors(scope, request.authors);
        const movieFileId = await scope.movieFiles.store(prepared.movieFile);
        const submitterId = actor.userId.unwrap();

        const draft: NewSubmission = {
          status: 'new',
          title: gameName,
          submitterId,
          judgeId: null,
          publisherId: null,
          authors,
          additionalAuthors: externalAuthors,
          gameName,
          submittedGameVersion: blankToNull(request.gameVersion),
          branch: stripQuotes(request.goalName),
          romName: blankToNull(request.romName),
          emulatorVersion: blankToNull(request.emulator),
          encodeEmbedLink: this.embedLink(request.encodeEmbedLink),
          gameId: null,
          gameVersionId: null,
          gameGoalId: null,
          systemId: mapped.systemId,
          systemFrameRateId: mapped.systemFrameRateId,
          intendedClassId: null,
          rejectionReasonId: null,
          movieFileId,
          movieExtension: mapped.movieExtension,
          movieStartType: mapped.movieStartType,
          frames: mapped.frames,
          rerecordCount: mapped.rerecordCount,
          cycleCount: mapped.cycleCount,
          annotations: mapped.annotations,
          warnings: mapped.warnings,
          hashType: mapped.hashType,
          hash: mapped.hash,
          topicId: null,
          isEventSubmission: request.isEventSubmission ?? false,
        };
        const inserted = await scope.submissions.insert(draft);

        await scope.wiki.add({
          pageName: submissionWikiPageName(inserted.id),
          markup: request.markup,
          authorId: submitterId,
          revisionMessage: `Auto-generated from Submission #${inserted.id}`,
        });

        const title = generateSubmissionTitle({
          id: inserted.id,
          authorNames: authors.map((author) => author.userName),
          additionalAuthors: externalAuthors,
          systemCode: mapped.systemCode,
          gameName,
          branch: draft.branch,
          frames: mapped.frames,
          frameRate: mapped.frameRate,
        });
        const topicId = await scope.forum.createSubmissionTopic({
          forumId: this.settings.workbenchForumId,
          submissionId: inserted.id,
          title,
          posterId: submitterId,
          text: request.markup,
        });
        await scope.submissions.update(
          { ...inserted, title, topicId },
          inserted.version
        );
        return { id: inserted.id, title };
      });

      this.logger.log(`${actor.userName} submitted ${outcome.title}`);
      return outcome;
    });
  }

  updateSubmission(
    request: UpdateSubmissionRequest,
    actor: Actor
  ): Promise<OperationResult<UpdateSubmissionOutcome>> {
    return runOperation(this.logger, 'UpdateSubmission', async () => {
      const gameName = blankToNull(request.gameName);
      if (!gameName) {
        throw new ValidationFailedError('A game name is required');
      }

      const scope = this.unitOfWork.current();
      const submission = await scope.submissions.findById(request.submissionId);
      if (!submission) {
        throw new NotFoundError('Submission not found');
      }
      if (submission.status === 'published') {
        throw new PreconditionFailedError(
          'Published submissions can no longer be edited'
        );
      }
      if (
        request.status !== submission.status &&
        !this.authorization.statusesFor(submission, actor).has(request.status)
      ) {
        throw new PreconditionFailedError(
          `Status can not be changed from ${submission.status} to ${request.status}`
        );
      }

      const catalog = await this.validateCatalog(scope, request);
      const prepared = request.replaceMovie
        ? await this.ingest.prepare(request.replaceMovie)
        : null;

      let updated: { title: string; topicId: number | null; taskIds: number[] };
      try {
        updated = await this.unitOfWork.transaction((trx) =>
          this.applyUpdate(trx, submission, request, {
            actor,
            gameName,
            catalog,
            prepared,
          })
        );
      } catch (error) {
        if (error instanceof ConcurrencyConflictError) {
          throw new PreconditionFailedError(
            'Submission changed while it was being edited',
            error
          );
        }
        throw error;
      }

      if (updated.topicId !== null) {
        await this.retitleTopic(updated.topicId, updated.title);
      }
      await this.dispatcher.dispatchAfterCommit(updated.taskIds);

      this.logger.log(
        `${actor.userName} updated submission ${submission.id} (${submission.status} -> ${request.status})`
      );
      return { previousStatus: submission.status, title: updated.title };
    });
  }

  private async applyUpdate(
    scope: WorkflowScope,
    submission: Submission,
    request: UpdateSubmissionRequest,
    context: Readonly<{
      actor: Actor;
      gameName: string;
      catalog: CatalogSelection;
      prepared: PreparedMovie | null;
    }>
  ): Promise<{ title: string; topicId: number | null; taskIds: number[] }> {
    const { actor, prepared } = context;
    const userId = actor.userId.unwrap();
    const previous = submission.status;
    const next = request.status;

    let judgeId = submission.judgeId;
    if (judgeIsClaiming(previous, next)) {
      judgeId = userId;
    } else if (judgeIsUnclaiming(next)) {
      judgeId = null;
    }
    let publisherId = submission.publisherId;
    if (publisherIsClaiming(previous, next)) {
      publisherId = userId;
    } else if (publisherIsUnclaiming(previous, next)) {
      publisherId = null;
    }

    let movie: Partial<Submission> = {};
    if (prepared) {
      const { mapped } = prepared;
      movie = {
        movieFileId: await scope.movieFiles.store(prepared.movieFile),
        systemId: mapped.systemId,
        systemFrameRateId: mapped.systemFrameRateId,
        movieExtension: mapped.movieExtension,
        movieStartType: mapped.movieStartType,
        frames: mapped.frames,
        rerecordCount: mapped.rerecordCount,
        cycleCount: mapped.cycleCount,
        annotations: mapped.annotations,
        warnings: mapped.warnings,
        hashType: mapped.hashType,
        hash: mapped.hash,
      };
    }

    const authors = await this.resolveAuthors(scope, request.authors);
    const draft: Submission = {
      ...submission,
      ...movie,
      ...context.catalog,
      status: next,
      judgeId,
      publisherId,
      rejectionReasonId:
        next === 'rejected' ? (request.rejectionReasonId ?? null) : null,
      gameName: context.gameName,
      submittedGameVersion: blankToNull(request.gameVersion),
      branch: stripQuotes(request.goal),
      romName: blankToNull(request.romName),
      emulatorVersion: blankToNull(request.emulator),
      encodeEmbedLink: this.embedLink(request.encodeEmbedLink),
      additionalAuthors: normalizeCsv(request.externalAuthors ?? null),
      authors,
    };

    const system =
      draft.systemId !== null
        ? await scope.systems.findSystemById(draft.systemId)
        : null;
    const frameRate =
      draft.systemFrameRateId !== null
        ? await scope.systems.findFrameRateById(draft.systemFrameRateId)
        : null;
    const title = generateSubmissionTitle({
      id: submission.id,
      authorNames: authors.map((author) => author.userName),
      additionalAuthors: draft.additionalAuthors,
      systemCode: system?.code ?? null,
      gameName: draft.gameName,
      branch: draft.branch,
      frames: draft.frames,
      frameRate: frameRate?.frameRate ?? null,
    });

    const taskIds: number[] = [];
    if (previous !== next) {
      await scope.statusHistory.append({
        submissionId: submission.id,
        status: previous,
        createdAt: this.clock.now(),
      });
      if (submission.topicId !== null) {
        await this.moveTopicFor(scope, submission.topicId, next);
      }
      if (isDormant(next)) {
        taskIds.push(
          await scope.outbox.enqueue({
            kind: 'notify_dormant',
            submissionId: submission.id,
            status: next,
          })
        );
      }
    }

    if (request.markupChanged) {
      await scope.wiki.add({
        pageName: submissionWikiPageName(submission.id),
        markup: request.markup ?? '',
        authorId: userId,
        revisionMessage: request.revisionMessage ?? '',
        minorEdit: request.minorEdit ?? false,
      });
    }

    await scope.submissions.update({ ...draft, title }, submission.version);
    return { title, topicId: submission.topicId, taskIds };
  }

  /** Playground topics go to the playground forum, open work to the workbench. */
  private async moveTopicFor(
    scope: WorkflowScope,
    topicId: number,
    status: SubmissionStatus
  ): Promise<void> {
    const forumId = await scope.forum.findForumId(topicId);
    if (forumId === null) return;

    const { playgroundForumId, workbenchForumId } = this.settings;
    if (status === 'playground' && forumId !== playgroundForumId) {
      await scope.forum.moveTopic(topicId, playgroundForumId);
    } else if (isWorkInProgress(status) && forumId !== workbenchForumId) {
      await scope.forum.moveTopic(topicId, workbenchForumId);
    }
  }

  private async retitleTopic(topicId: number, title: string): Promise<void> {
    const forum = this.unitOfWork.current().forum;
    try {
      const outcome = await executeWithRetry(() =>
        forum.retitle(topicId, title)
      );
      if (!outcome.success) {
        this.logger.warn(`Topic ${topicId} could not be retitled to ${title}`);
      }
    } catch (error) {
      this.logger.error(
        `Retitling topic ${topicId} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private async validateCatalog(
    scope: WorkflowScope,
    request: UpdateSubmissionRequest
  ): Promise<CatalogSelection> {
    const gameId = request.gameId ?? null;
    const gameVersionId = request.gameVersionId ?? null;
    const gameGoalId = request.gameGoalId ?? null;
    const intendedClassId = request.intendedClassId ?? null;

    if (
      intendedClassId !== null &&
      !(await scope.games.findPublicationClass(intendedClassId))
    ) {
      throw new ValidationFailedError(
        `Unknown publication class ${intendedClassId}`
      );
    }

    if (gameId === null) {
      if (gameVersionId !== null || gameGoalId !== null) {
        throw new ValidationFailedError(
          'A game version or goal requires a game'
        );
      }
      return { gameId, gameVersionId, gameGoalId, intendedClassId };
    }

    if (!(await scope.games.findGame(gameId))) {
      throw new ValidationFailedError(`Unknown game ${gameId}`);
    }
    if (gameVersionId !== null) {
      const version = await scope.games.findVersion(gameVersionId);
      if (version?.gameId !== gameId) {
        throw new ValidationFailedError(
          `Version ${gameVersionId} does not belong to game ${gameId}`
        );
      }
    }
    if (gameGoalId !== null) {
      const goal = await scope.games.findGoal(gameGoalId);
      if (goal?.gameId !== gameId) {
        throw new ValidationFailedError(
          `Goal ${gameGoalId} does not belong to game ${gameId}`
        );
      }
    }
    return { gameId, gameVersionId, gameGoalId, intendedClassId };
  }

  /** Resolves user names to authors, keeping the order they were given in. */
  private async resolveAuthors(
    scope: WorkflowScope,
    userNames: readonly string[]
  ): Promise<SubmissionAuthor[]> {
    const names = [
      ...new Set(userNames.map((name) => name.trim()).filter(Boolean)),
    ];
    if (names.length === 0) return [];

    const users = await scope.users.findByUserNames(names);
    const byName = new Map(
      users.map((user) => [user.userName.toLowerCase(), user])
    );
    const unknown = names.filter((name) => !byName.has(name.toLowerCase()));
    if (unknown.length > 0) {
      throw new ValidationFailedError('Unknown authors', unknown);
    }

    return names.flatMap((name, ordinal) => {
      const user = byName.get(name.toLowerCase());
      return user ? [{ userId: user.id, userName: user.userName, ordinal }] : [];
    });
  }

  private embedLink(url: string | null | undefined): string | null {
    const trimmed = blankToNull(url);
    return trimmed ? this.videoSync.convertToEmbedLink(trimmed) : null;
  }
}
