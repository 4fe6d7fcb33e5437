import { Kysely, Selectable } from 'kysely';
import type { GameSystem, SystemFrameRate } from '@tasflow/domain';
import type {
  SystemFrameRatesTable,
  WorkflowDatabase,
} from '@platform/infrastructure/database/database.types';
import { SystemCatalog } from '../application/ports/system-catalog';

const toFrameRate = (
  row: Selectable<SystemFrameRatesTable>
): SystemFrameRate => ({
  id: row.id,
  systemId: row.system_id,
  frameRate: Number(row.frame_rate),
  regionCode: row.region_code,
});

export class KyselySystemCatalog extends SystemCatalog {
  constructor(private readonly db: Kysely<WorkflowDatabase>) {
    super();
  }

  async findSystemByCode(code: string): Promise<GameSystem | null> {
    const row = await this.db
      .selectFrom('workflow.game_systems')
      .select(['id', 'code', 'display_name'])
      .where('code', '=', code)
      .executeTakeFirst();
    return row
      ? { id: row.id, code: row.code, displayName: row.display_name }
      : null;
  }

  async findSystemById(id: number): Promise<GameSystem | null> {
    const row = await this.db
      .selectFrom('workflow.game_systems')
      .select(['id', 'code', 'display_name'])
      .where('id', '=', id)
      .executeTakeFirst();
    return row
      ? { id: row.id, code: row.code, displayName: row.display_name }
      : null;
  }

  async findFrameRateById(id: number): Promise<SystemFrameRate | null> {
    const row = await this.db
      .selectFrom('workflow.system_frame_rates')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toFrameRate(row) : null;
  }

  async findDefaultFrameRate(
    systemId: number,
    regionCode: string
  ): Promise<SystemFrameRate | null> {
    const row = await this.db
      .selectFrom('workflow.system_frame_rates')
      .selectAll()
      .where('system_id', '=', systemId)
      .where('region_code', '=', regionCode)
      .where('obsolete', '=', false)
      .orderBy('id', 'asc')
      .executeTakeFirst();
    return row ? toFrameRate(row) : null;
  }

  async findOrCreateFrameRate(
    systemId: number,
    frameRate: number,
    regionCode: string
  ): Promise<SystemFrameRate> {
    await this.db
      .insertInto('workflow.system_frame_rates')
      .values({
        system_id: systemId,
        frame_rate: frameRate,
        region_code: regionCode,
      })
      .onConflict((oc) =>
        oc.columns(['system_id', 'frame_rate', 'region_code']).doNothing()
      )
      .execute();

    // Whichever insert won, the triple now exists exactly once.
    const row = await this.db
      .selectFrom('workflow.system_frame_rates')
      .selectAll()
      .where('system_id', '=', systemId)
      .where('frame_rate', '=', frameRate)
      .where('region_code', '=', regionCode)
      .executeTakeFirstOrThrow();
    return toFrameRate(row);
  }

  async isDeprecatedFormat(fileExtension: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('workflow.deprecated_movie_formats')
      .select('deprecated')
      .where('file_extension', '=', fileExtension.toLowerCase())
      .executeTakeFirst();
    return row?.deprecated ?? false;
  }
}
