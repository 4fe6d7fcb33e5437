import { afterEach, describe, expect, it, vi } from 'vitest';
import { OutboxWorker } from '../../src/outbox/application/outbox-worker';
import { createWorkflowFixture } from '../support/workflow-fixture';

const idle = { succeeded: [], failed: [] };

describe('OutboxWorker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('drains the outbox on every poll until destroyed', async () => {
    vi.useFakeTimers();
    const fixture = createWorkflowFixture({ outboxPollIntervalMs: 1000 });
    const drain = vi
      .spyOn(fixture.dispatcher, 'drainPending')
      .mockResolvedValue(idle);
    const worker = new OutboxWorker(fixture.dispatcher, fixture.settings);

    worker.onApplicationBootstrap();
    await vi.advanceTimersByTimeAsync(1000);
    expect(drain).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1000);
    expect(drain).toHaveBeenCalledTimes(2);

    worker.onModuleDestroy();
    await vi.advanceTimersByTimeAsync(5000);
    expect(drain).toHaveBeenCalledTimes(2);
  });

  it('does not poll when the interval is zero', async () => {
    vi.useFakeTimers();
    const fixture = createWorkflowFixture({ outboxPollIntervalMs: 0 });
    const drain = vi
      .spyOn(fixture.dispatcher, 'drainPending')
      .mockResolvedValue(idle);
    const worker = new OutboxWorker(fixture.dispatcher, fixture.settings);

    worker.onApplicationBootstrap();
    await vi.advanceTimersByTimeAsync(60_000);

    expect(drain).not.toHaveBeenCalled();
  });

  it('runs pending tasks on a tick', async () => {
    const fixture = createWorkflowFixture();
    await fixture.unitOfWork.current().outbox.enqueue({
      kind: 'notify_publication',
      submissionId: 4,
      publicationId: 1,
    });
    const worker = new OutboxWorker(fixture.dispatcher, fixture.settings);

    await worker.tick();

    expect(fixture.automationAgent.published).toEqual([
      { submissionId: 4, publicationId: 1 },
    ]);
    expect(fixture.tables.outbox.get(1)?.state).toBe('done');
  });

  it('skips a poll while the previous one is still running', async () => {
    const fixture = createWorkflowFixture();
    const drain = vi.spyOn(fixture.dispatcher, 'drainPending');
    const worker = new OutboxWorker(fixture.dispatcher, fixture.settings);

    await Promise.all([worker.tick(), worker.tick()]);

    expect(drain).toHaveBeenCalledTimes(1);
  });
});
