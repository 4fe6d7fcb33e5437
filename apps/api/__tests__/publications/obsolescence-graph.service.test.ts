import { describe, expect, it } from 'vitest';
import type { PublicationUrl } from '@tasflow/domain';
import {
  createWorkflowFixture,
  seedPublication,
} from '../support/workflow-fixture';

const streaming = (url: string): PublicationUrl => ({
  url,
  type: 'streaming',
  displayName: null,
});

describe('ObsolescenceGraphService', () => {
  describe('obsoleteWith', () => {
    it('links the publications and re-syncs every recognized video', async () => {
      const fixture = createWorkflowFixture();
      const old = seedPublication(fixture.tables, {
        urls: [
          streaming('https://youtu.be/first'),
          streaming('https://youtu.be/second'),
          {
            url: 'https://youtu.be/mirror',
            type: 'mirror',
            displayName: null,
          },
        ],
      });
      const replacement = seedPublication(fixture.tables);

      const result = await fixture.obsolescence.obsoleteWith(
        old.id,
        replacement.id
      );

      expect(result).toEqual({ ok: true, value: true });
      expect(fixture.tables.publications.get(old.id)?.obsoletedById).toBe(
        replacement.id
      );
      expect(fixture.videoSync.synced.map((video) => video.url)).toEqual([
        'https://youtu.be/first',
        'https://youtu.be/second',
      ]);
      expect(
        fixture.videoSync.synced.every(
          (video) => video.obsoletedById === replacement.id
        )
      ).toBe(true);
    });

    it('keeps syncing the remaining videos when one fails', async () => {
      const fixture = createWorkflowFixture();
      const old = seedPublication(fixture.tables, {
        urls: [
          streaming('https://youtu.be/first'),
          streaming('https://youtu.be/second'),
        ],
      });
      const replacement = seedPublication(fixture.tables);
      fixture.videoSync.failingUrls.add('https://youtu.be/first');

      const result = await fixture.obsolescence.obsoleteWith(
        old.id,
        replacement.id
      );

      expect(result).toEqual({ ok: true, value: true });
      expect(fixture.videoSync.synced.map((video) => video.url)).toEqual([
        'https://youtu.be/second',
      ]);
      expect(
        [...fixture.tables.outbox.values()].map((task) => task.state)
      ).toEqual(['pending', 'done']);
    });

    it('returns false when the publication to obsolete does not exist', async () => {
      const fixture = createWorkflowFixture();
      const replacement = seedPublication(fixture.tables);

      const result = await fixture.obsolescence.obsoleteWith(99, replacement.id);

      expect(result).toEqual({ ok: true, value: false });
    });

    it('refuses to obsolete a publication with itself', async () => {
      const fixture = createWorkflowFixture();
      const publication = seedPublication(fixture.tables);

      const result = await fixture.obsolescence.obsoleteWith(
        publication.id,
        publication.id
      );

      expect(result).toEqual({
        ok: false,
        code: 'precondition_failed',
        errorMessage: 'A publication cannot obsolete itself',
      });
    });

    it('refuses a link that would close a cycle', async () => {
      const fixture = createWorkflowFixture();
      const first = seedPublication(fixture.tables, { obsoletedById: 2 });
      const second = seedPublication(fixture.tables);

      const result = await fixture.obsolescence.obsoleteWith(second.id, first.id);

      expect(result).toEqual({
        ok: false,
        code: 'precondition_failed',
        errorMessage: 'Obsoleting 2 with 1 would create a cycle',
      });
      expect(fixture.tables.publications.get(second.id)?.obsoletedById).toBeNull();
    });

    it('refuses a replacement from another game', async () => {
      const fixture = createWorkflowFixture();
      const old = seedPublication(fixture.tables);
      const other = seedPublication(fixture.tables, { gameId: 2, gameGoalId: 3 });

      const result = await fixture.obsolescence.obsoleteWith(old.id, other.id);

      expect(result).toMatchObject({ ok: false, code: 'precondition_failed' });
      expect(fixture.tables.publications.get(old.id)?.obsoletedById).toBeNull();
    });

    it('reports a missing replacement', async () => {
      const fixture = createWorkflowFixture();
      const old = seedPublication(fixture.tables);

      const result = await fixture.obsolescence.obsoleteWith(old.id, 42);

      expect(result).toEqual({
        ok: false,
        code: 'not_found',
        errorMessage: 'Obsoleting publication not found',
      });
    });
  });
});
