import { Kysely } from 'kysely';
import type {
  Game,
  GameGoal,
  GameVersion,
  PublicationClass,
} from '@tasflow/domain';
import type { WorkflowDatabase } from '@platform/infrastructure/database/database.types';
import { GameCatalog } from '../application/ports/game-catalog';

export class KyselyGameCatalog extends GameCatalog {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async findGame(id: number): Promise<Game | null> {
    const row = await this.db
      .selectFrom('workflow.games')
      .select(['id', 'display_name'])
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? { id: row.id, displayName: row.display_name } : null;
  }

  async findVersion(id: number): Promise<GameVersion | null> {
    const row = await this.db
      .selectFrom('workflow.game_versions')
      .select(['id', 'game_id', 'name'])
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? { id: row.id, gameId: row.game_id, name: row.name } : null;
  }

  async findGoal(id: number): Promise<GameGoal | null> {
    const row = await this.db
      .selectFrom('workflow.game_goals')
      .select(['id', 'game_id', 'display_name'])
      .where('id', '=', id)
      .executeTakeFirst();
    return row
      ? { id: row.id, gameId: row.game_id, displayName: row.display_name }
      : null;
  }

  async findPublicationClass(id: number): Promise<PublicationClass | null> {
    const row = await this.db
      .selectFrom('workflow.publication_classes')
      .select(['id', 'name', 'icon_path'])
      .where('id', '=', id)
      .executeTakeFirst();
    return row
      ? { id: row.id, name: row.name, iconPath: row.icon_path }
      : null;
  }
}
