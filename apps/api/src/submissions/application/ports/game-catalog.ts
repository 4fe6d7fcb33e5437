import type {
  Game,
  GameGoal,
  GameVersion,
  PublicationClass,
} from '@tasflow/domain';

export abstract class GameCatalog {
  abstract findGame(id: number): Promise<Game | null>;

  abstract findVersion(id: number): Promise<GameVersion | null>;

  abstract findGoal(id: number): Promise<GameGoal | null>;

  abstract findPublicationClass(id: number): Promise<PublicationClass | null>;
}
