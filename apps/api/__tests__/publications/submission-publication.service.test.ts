import { describe, expect, it } from 'vitest';
import {
  publicationWikiPageName,
  type PublicationUrl,
} from '@tasflow/domain';
import type { PublishRequest } from '../../src/publications/application/submission-publication.service';
import {
  createWorkflowFixture,
  judge,
  publisher,
  seedPublication,
  seedPublishableSubmission,
  seedSubmission,
} from '../support/workflow-fixture';

const streaming = (url: string): PublicationUrl => ({
  url,
  type: 'streaming',
  displayName: null,
});

const request = (overrides: Partial<PublishRequest> = {}): PublishRequest => ({
  submissionId: 1,
  movieFilename: 'somegame-warps',
  markup: 'A fast run through the warp zones.',
  onlineWatchingUrl: 'https://youtu.be/abc123',
  mirrorSiteUrl: 'https://archive.example.org/somegame',
  selectedFlags: [1],
  selectedTags: [4, 5],
  ...overrides,
});

const TITLE = '[1] NES Some Game "warps" by Alice in 01:00.00';

describe('SubmissionPublicationService', () => {
  describe('publish', () => {
    it('creates the publication and retires the submission', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);

      const result = await fixture.publishing.publish(request(), publisher());

      expect(result).toEqual({
        ok: true,
        value: { publicationId: 1, publicationTitle: TITLE },
      });

      const publication = fixture.tables.publications.get(1);
      expect(publication).toMatchObject({
        title: TITLE,
        submissionId: 1,
        publicationClassId: 1,
        gameId: 1,
        gameGoalId: 2,
        movieFileName: 'somegame-warps.bk2',
        movieFileId: 2,
        flagIds: [1],
        tagIds: [4, 5],
        obsoletedById: null,
        urls: [
          streaming('https://youtu.be/abc123'),
          {
            url: 'https://archive.example.org/somegame',
            type: 'mirror',
            displayName: null,
          },
        ],
      });
      expect(fixture.tables.movieFiles.get(2)?.fileName).toBe('somegame-warps.bk2');

      const wiki = fixture.tables.latestWiki(publicationWikiPageName(1));
      expect(wiki).toMatchObject({
        markup: 'A fast run through the warp zones.',
        authorId: 20,
        revisionMessage: 'Auto-generated from Movie #1',
      });

      const submission = fixture.tables.submissions.get(1);
      expect(submission?.status).toBe('published');
      expect(submission?.version).toBe(2);
      expect(fixture.tables.statusHistory).toEqual([
        {
          submissionId: 1,
          status: 'publication_underway',
          createdAt: new Date('2024-05-10T12:00:00Z'),
        },
      ]);
    });

    it('runs the downstream tasks once the publication is committed', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);

      await fixture.publishing.publish(request(), publisher());

      expect(fixture.roleGrantor.grants).toEqual([
        { authorIds: [1], publicationTitle: TITLE },
      ]);
      expect(fixture.automationAgent.published).toEqual([
        { submissionId: 1, publicationId: 1 },
      ]);
      expect(fixture.videoSync.synced).toEqual([
        {
          publicationId: 1,
          url: 'https://youtu.be/abc123',
          displayName: null,
          title: TITLE,
          description: 'A fast run through the warp zones.',
          systemCode: 'NES',
          gameDisplayName: 'Some Game',
          authorNames: ['Alice'],
          publishedAt: fixture.tables.now,
          obsoletedById: null,
        },
      ]);
      expect(
        [...fixture.tables.outbox.values()].map((task) => [
          task.payload.kind,
          task.state,
        ])
      ).toEqual([
        ['grant_publication_roles', 'done'],
        ['notify_publication', 'done'],
        ['video_sync', 'done'],
      ]);
    });

    it('stays successful when a downstream task fails', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);
      fixture.automationAgent.failure = new Error('forum offline');

      const result = await fixture.publishing.publish(request(), publisher());

      expect(result.ok).toBe(true);
      expect(fixture.tables.outbox.get(2)).toMatchObject({
        state: 'pending',
        attempts: 1,
        lastError: 'forum offline',
      });
      expect(fixture.tables.outbox.get(3)?.state).toBe('done');
    });

    it('rolls everything back when the wiki write fails', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);
      fixture.tables.faults.set('wiki.add', new Error('wiki unavailable'));

      const result = await fixture.publishing.publish(request(), publisher());

      expect(result).toEqual({
        ok: false,
        code: 'precondition_failed',
        errorMessage: 'Unable to publish',
        detail: 'wiki unavailable',
      });
      expect(fixture.tables.publications.size).toBe(0);
      expect(fixture.tables.movieFiles.size).toBe(1);
      expect(fixture.tables.outbox.size).toBe(0);
      expect(fixture.tables.statusHistory).toEqual([]);
      expect(fixture.tables.submissions.get(1)).toMatchObject({
        status: 'publication_underway',
        version: 1,
      });
      expect(fixture.roleGrantor.grants).toEqual([]);
    });

    it('refuses a submission that is not claimed for publication', async () => {
      const fixture = createWorkflowFixture();
      seedSubmission(fixture.tables, { status: 'accepted', gameId: 1 });

      const result = await fixture.publishing.publish(request(), publisher());

      expect(result).toEqual({
        ok: false,
        code: 'precondition_failed',
        errorMessage: 'Submission is not ready to be published',
      });
    });

    it('refuses a movie filename that is already taken', async () => {
      const fixture = createWorkflowFixture();
      seedPublication(fixture.tables, { movieFileName: 'somegame-warps.bk2' });
      seedPublishableSubmission(fixture.tables);

      const result = await fixture.publishing.publish(request(), publisher());

      expect(result).toEqual({
        ok: false,
        code: 'precondition_failed',
        errorMessage: 'Movie filename somegame-warps.bk2 already exists',
      });
      expect(fixture.tables.publications.size).toBe(1);
    });

    it('validates the filename and watch url', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);

      const blankName = await fixture.publishing.publish(
        request({ movieFilename: '  ' }),
        publisher()
      );
      const blankUrl = await fixture.publishing.publish(
        request({ onlineWatchingUrl: '' }),
        publisher()
      );

      expect(blankName).toMatchObject({
        code: 'validation_failed',
        errorMessage: 'A movie filename is required',
      });
      expect(blankUrl).toMatchObject({
        code: 'validation_failed',
        errorMessage: 'An online watching url is required',
      });
    });

    it('requires the publishing permission', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);

      const result = await fixture.publishing.publish(request(), judge());

      expect(result).toMatchObject({ ok: false, code: 'precondition_failed' });
      expect(fixture.tables.publications.size).toBe(0);
    });

    it('reports a missing submission', async () => {
      const fixture = createWorkflowFixture();

      const result = await fixture.publishing.publish(request(), publisher());

      expect(result).toMatchObject({ ok: false, code: 'not_found' });
    });

    it('obsoletes the previous publication and re-syncs each of its videos', async () => {
      const fixture = createWorkflowFixture();
      const previous = seedPublication(fixture.tables, {
        urls: [
          streaming('https://youtu.be/old1'),
          streaming('https://youtu.be/old2'),
          streaming('https://videos.example.org/old.mkv'),
        ],
      });
      seedPublishableSubmission(fixture.tables);
      fixture.videoSync.failingUrls.add('https://youtu.be/old1');

      const result = await fixture.publishing.publish(
        request({ movieToObsolete: previous.id }),
        publisher()
      );

      expect(result).toEqual({
        ok: true,
        value: {
          publicationId: 2,
          publicationTitle: '[2] NES Some Game "warps" by Alice in 01:00.00',
        },
      });
      expect(fixture.tables.publications.get(previous.id)?.obsoletedById).toBe(2);
      expect(
        fixture.videoSync.synced.map((video) => [
          video.publicationId,
          video.url,
          video.obsoletedById,
        ])
      ).toEqual([
        [1, 'https://youtu.be/old2', 2],
        [2, 'https://youtu.be/abc123', null],
      ]);
      expect(fixture.tables.outbox.get(1)).toMatchObject({
        state: 'pending',
        attempts: 1,
        lastError: 'Video service rejected https://youtu.be/old1',
      });
    });

    it('refuses to obsolete a publication of another game', async () => {
      const fixture = createWorkflowFixture();
      const other = seedPublication(fixture.tables, { gameId: 2, gameGoalId: 3 });
      seedPublishableSubmission(fixture.tables);

      const result = await fixture.publishing.publish(
        request({ movieToObsolete: other.id }),
        publisher()
      );

      expect(result).toEqual({
        ok: false,
        code: 'precondition_failed',
        errorMessage: 'Only a publication of the same game can be obsoleted',
      });
      expect(fixture.tables.publications.size).toBe(1);
    });

    it('refuses to obsolete a publication that does not exist', async () => {
      const fixture = createWorkflowFixture();
      seedPublishableSubmission(fixture.tables);

      const result = await fixture.publishing.publish(
        request({ movieToObsolete: 99 }),
        publisher()
      );

      expect(result).toEqual({
        ok: false,
        code: 'not_found',
        errorMessage: 'Publication to obsolete not found',
      });
    });
  });

  describe('obsoletePublicationTags', () => {
    it('returns the title, tags and description of the publication', async () => {
      const fixture = createWorkflowFixture();
      const publication = seedPublication(fixture.tables, { tagIds: [4, 7] });
      fixture.tables.wikiRevisions.push({
        pageName: publicationWikiPageName(publication.id),
        revision: 1,
        markup: 'Old description',
        authorId: 20,
        revisionMessage: null,
        minorEdit: false,
        createdAt: fixture.tables.now,
      });

      const result = await fixture.publishing.obsoletePublicationTags(
        publication.id
      );

      expect(result).toEqual({
        ok: true,
        value: {
          title: publication.title,
          tagIds: [4, 7],
          markup: 'Old description',
        },
      });
    });

    it('returns null for an unknown publication', async () => {
      const fixture = createWorkflowFixture();

      const result = await fixture.publishing.obsoletePublicationTags(8);

      expect(result).toEqual({ ok: true, value: null });
    });
  });
});
