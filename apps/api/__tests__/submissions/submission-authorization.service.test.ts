import { describe, expect, it } from 'vitest';
import {
  alice,
  createWorkflowFixture,
  judge,
  seedSubmission,
} from '../support/workflow-fixture';

// The fixture clock reads 2024-05-10T12:00:00Z.
const SEVENTY_ONE_HOURS_AGO = new Date('2024-05-07T13:00:00Z');

describe('SubmissionAuthorizationService', () => {
  it('withholds verdicts from the judge until the window opens', async () => {
    const fixture = createWorkflowFixture();
    seedSubmission(fixture.tables, {
      status: 'judging_underway',
      judgeId: 10,
      createdAt: SEVENTY_ONE_HOURS_AGO,
    });

    const statuses = await fixture.authorization.availableStatusesForSubmission(
      1,
      judge()
    );
    const hours = await fixture.authorization.hoursRemainingForSubmission(1);

    expect(statuses).toEqual({
      ok: true,
      value: ['judging_underway', 'cancelled'],
    });
    expect(hours).toEqual({ ok: true, value: 1 });
  });

  it('offers verdicts once the window is open', async () => {
    const fixture = createWorkflowFixture();
    seedSubmission(fixture.tables, {
      status: 'judging_underway',
      judgeId: 10,
      createdAt: SEVENTY_ONE_HOURS_AGO,
    });
    fixture.clock.advanceHours(1);

    const statuses = await fixture.authorization.availableStatusesForSubmission(
      1,
      judge()
    );

    expect(statuses).toEqual({
      ok: true,
      value: [
        'new',
        'delayed',
        'needs_more_info',
        'judging_underway',
        'accepted',
        'rejected',
        'cancelled',
        'playground',
      ],
    });
    expect(await fixture.authorization.hoursRemainingForSubmission(1)).toEqual({
      ok: true,
      value: 0,
    });
  });

  it('lets the author cancel but not judge', async () => {
    const fixture = createWorkflowFixture();
    const submission = seedSubmission(fixture.tables);

    expect([...fixture.authorization.statusesFor(submission, alice())]).toEqual([
      'new',
      'cancelled',
    ]);
  });

  it('stops the countdown for statuses that are no longer judged', () => {
    const fixture = createWorkflowFixture();

    expect(
      fixture.authorization.hoursRemainingForJudging(
        'accepted',
        SEVENTY_ONE_HOURS_AGO
      )
    ).toBe(0);
    expect(
      fixture.authorization.hoursRemainingForJudging('new', SEVENTY_ONE_HOURS_AGO)
    ).toBe(1);
  });

  it('reports a missing submission', async () => {
    const fixture = createWorkflowFixture();

    expect(await fixture.authorization.hoursRemainingForSubmission(3)).toEqual({
      ok: false,
      code: 'not_found',
      errorMessage: 'Submission not found',
    });
  });
});
