import { Injectable, Logger } from '@nestjs/common';
import {
  buildPublicationHistory,
  type PublicationHistoryGroup,
} from '@tasflow/domain';
import {
  OperationResult,
  runOperation,
} from '@platform/application/operation-result';
import { WorkflowUnitOfWork } from '@platform/application/workflow-unit-of-work';

/** Read side of the obsolescence graph. */
@Injectable()
export class PublicationHistoryService {
  private readonly logger = new Logger(PublicationHistoryService.name);

  constructor(private readonly unitOfWork: WorkflowUnitOfWork) {}

  forGame(gameId: number): Promise<OperationResult<PublicationHistoryGroup | null>> {
    return runOperation(this.logger, 'ForGame', () => this.loadForGame(gameId));
  }

  forGameByPublication(
    publicationId: number
  ): Promise<OperationResult<PublicationHistoryGroup | null>> {
    return runOperation(this.logger, 'ForGameByPublication', async () => {
      const publication = await this.unitOfWork
        .current()
        .publications.findById(publicationId);
      return publication ? this.loadForGame(publication.gameId) : null;
    });
  }

  private async loadForGame(
    gameId: number
  ): Promise<PublicationHistoryGroup | null> {
    const scope = this.unitOfWork.current();
    const game = await scope.games.findGame(gameId);
    if (!game) {
      return null;
    }
    const entries = await scope.publications.listHistoryForGame(gameId);
    return buildPublicationHistory(game, entries);
  }
}
