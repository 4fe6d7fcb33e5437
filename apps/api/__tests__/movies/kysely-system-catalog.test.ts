import { NoResultError } from 'kysely';
import { describe, expect, it } from 'vitest';
import { KyselySystemCatalog } from '../../src/movies/infrastructure/kysely-system-catalog';
import { recordingDatabase } from '../support/recording-database';

describe('KyselySystemCatalog', () => {
  it('inserts an overridden frame rate without conflicting, then reads the stored row', async () => {
    const { db, queries } = recordingDatabase();

    // The recording database answers with no rows, so the read finds nothing.
    await expect(
      new KyselySystemCatalog(db).findOrCreateFrameRate(1, 59.94, 'PAL')
    ).rejects.toBeInstanceOf(NoResultError);

    expect(queries.map((query) => query.sql)).toEqual([
      'insert into "workflow"."system_frame_rates" ("system_id", "frame_rate", "region_code") values ($1, $2, $3) on conflict ("system_id", "frame_rate", "region_code") do nothing',
      'select * from "workflow"."system_frame_rates" where "system_id" = $1 and "frame_rate" = $2 and "region_code" = $3',
    ]);
    expect(queries.map((query) => query.parameters)).toEqual([
      [1, 59.94, 'PAL'],
      [1, 59.94, 'PAL'],
    ]);
  });
});
