import { describe, expect, it } from 'vitest';
import { ConcurrencyConflictError } from '../../src/platform/application/errors';
import { KyselySubmissionRepository } from '../../src/submissions/infrastructure/kysely-submission.repository';
import { WorkflowTables } from '../support/in-memory-workflow';
import { recordingDatabase } from '../support/recording-database';
import { seedSubmission } from '../support/workflow-fixture';

describe('KyselySubmissionRepository', () => {
  it('updates only the expected version and reports a conflict when no row matches', async () => {
    const { db, queries } = recordingDatabase();
    const repository = new KyselySubmissionRepository(db);
    const submission = seedSubmission(new WorkflowTables(), { version: 3 });

    await expect(repository.update(submission, 3)).rejects.toBeInstanceOf(
      ConcurrencyConflictError
    );

    expect(queries).toHaveLength(1);
    const [query] = queries;
    expect(query?.sql).toMatch(
      /^update "workflow"\."submissions" set .* where "id" = \$\d+ and "version" = \$\d+ returning \*$/
    );
    expect(query?.parameters.slice(-2)).toEqual([submission.id, 3]);
  });
});
