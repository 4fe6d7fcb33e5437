import { gzipSync } from 'node:zlib';
import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { failedParseResult } from '@tasflow/domain';
import { ValidationFailedError } from '../../src/platform/application/errors';
import { parsedMovie } from '../support/fakes';
import { createWorkflowFixture } from '../support/workflow-fixture';

const MOVIE = new TextEncoder().encode('movie bytes');

describe('MovieFileIngestService', () => {
  describe('parseMovieFileOrZip', () => {
    it('parses a single movie file and stores it wrapped in a zip', async () => {
      const { ingest, parser } = createWorkflowFixture();

      const ingested = await ingest.parseMovieFileOrZip({
        fileName: 'run.bk2',
        content: MOVIE,
      });

      expect(parser.calls).toEqual([{ entry: 'parse', content: MOVIE }]);
      expect(ingested.movieFile.fileName).toBe('run.bk2');
      expect(ingested.movieFile.originalLength).toBe(MOVIE.length);
      const stored = await JSZip.loadAsync(ingested.movieFile.content);
      const entry = stored.file('run.bk2');
      expect(entry).not.toBeNull();
      expect(await entry?.async('string')).toBe('movie bytes');
    });

    it('dispatches zip archives to the zip entry point and stores them as-is', async () => {
      const { ingest, parser } = createWorkflowFixture();
      const archive = new JSZip();
      archive.file('run.bk2', MOVIE);
      const content = await archive.generateAsync({ type: 'uint8array' });

      const ingested = await ingest.parseMovieFileOrZip({
        fileName: 'Run.ZIP',
        content,
      });

      expect(parser.calls.map((call) => call.entry)).toEqual(['parseZip']);
      expect(ingested.movieFile.content).toBe(content);
    });

    it('treats a .zip name without a zip signature as a single file', async () => {
      const { ingest, parser } = createWorkflowFixture();

      await ingest.parseMovieFileOrZip({ fileName: 'run.zip', content: MOVIE });

      expect(parser.calls.map((call) => call.entry)).toEqual(['parse']);
    });

    it('decompresses gzip transport encoding', async () => {
      const { ingest, parser } = createWorkflowFixture();

      const ingested = await ingest.parseMovieFileOrZip({
        fileName: 'run.bk2',
        content: new Uint8Array(gzipSync(MOVIE)),
      });

      expect(parser.calls[0]?.content).toEqual(MOVIE);
      expect(ingested.movieFile.originalLength).toBe(MOVIE.length);
    });

    it('inflates gzip uploads off the calling task', async () => {
      const { ingest, parser } = createWorkflowFixture();

      const parsing = ingest.parseMovieFileOrZip({
        fileName: 'run.bk2',
        content: new Uint8Array(gzipSync(MOVIE)),
      });
      for (let turn = 0; turn < 20; turn++) {
        await Promise.resolve();
      }

      expect(parser.calls).toEqual([]);
      await parsing;
      expect(parser.calls).toEqual([{ entry: 'parse', content: MOVIE }]);
    });

    it('falls back to the raw bytes when the gzip stream is corrupt', async () => {
      const { ingest, parser } = createWorkflowFixture();
      const content = new Uint8Array([0x1f, 0x8b, 0x00, 0x01, 0x02]);

      await ingest.parseMovieFileOrZip({ fileName: 'run.bk2', content });

      expect(parser.calls[0]?.content).toBe(content);
    });

    it('rejects gzip uploads that inflate past the ceiling', async () => {
      const { ingest, parser } = createWorkflowFixture();
      const bomb = new Uint8Array(gzipSync(new Uint8Array(80 * 1024)));

      await expect(
        ingest.parseMovieFileOrZip({ fileName: 'run.bk2', content: bomb })
      ).rejects.toThrow('The movie file exceeds 65536 bytes once decompressed');
      expect(parser.calls).toEqual([]);
    });

    it('rejects raw uploads past the ceiling', async () => {
      const { ingest } = createWorkflowFixture();

      await expect(
        ingest.parseMovieFileOrZip({
          fileName: 'run.bk2',
          content: new Uint8Array(64 * 1024 + 1),
        })
      ).rejects.toThrow('The movie file exceeds 65536 bytes');
    });
  });

  describe('prepare', () => {
    it('maps the parse onto the catalog', async () => {
      const { ingest } = createWorkflowFixture();

      const prepared = await ingest.prepare({ fileName: 'run.bk2', content: MOVIE });

      expect(prepared.mapped).toEqual({
        systemId: 1,
        systemCode: 'NES',
        systemFrameRateId: 1,
        frameRate: 60,
        movieExtension: 'bk2',
        movieStartType: 'power_on',
        frames: 3600,
        rerecordCount: 1200,
        cycleCount: null,
        annotations: null,
        warnings: null,
        hashType: 'sha1',
        hash: 'ea343f4e445a9050d4b4fbac2c77d0693b1d0922',
      });
    });

    it('creates an overridden frame rate once and reuses it', async () => {
      const { ingest, parser, tables } = createWorkflowFixture();
      parser.result = parsedMovie({ frameRateOverride: 59.94, region: 'pal' });

      const first = await ingest.prepare({ fileName: 'a.bk2', content: MOVIE });
      const second = await ingest.prepare({ fileName: 'b.bk2', content: MOVIE });

      expect(first.mapped.systemFrameRateId).toBe(3);
      expect(second.mapped.systemFrameRateId).toBe(3);
      expect(tables.frameRates.get(3)).toEqual({
        id: 3,
        systemId: 1,
        frameRate: 59.94,
        regionCode: 'PAL',
      });
      expect(tables.frameRates.size).toBe(3);
    });

    it('caps annotations and joined warnings with an ellipsis', async () => {
      const { ingest, parser } = createWorkflowFixture();
      parser.result = parsedMovie({
        annotations: `  ${'a'.repeat(4000)}  `,
        warnings: ['w'.repeat(300), 'x'.repeat(300)],
      });

      const { mapped } = await ingest.prepare({ fileName: 'run.bk2', content: MOVIE });

      expect(mapped.annotations).toBe(`${'a'.repeat(3497)}...`);
      expect(mapped.warnings).toBe(`${'w'.repeat(300)},${'x'.repeat(196)}...`);
    });

    it('rejects a failed parse with its errors', async () => {
      const { ingest, parser } = createWorkflowFixture();
      parser.result = failedParseResult('bk2', 'Missing Header.txt');

      const error = await ingest
        .prepare({ fileName: 'run.bk2', content: MOVIE })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ValidationFailedError);
      expect(error).toMatchObject({
        message: 'The movie file could not be parsed',
        details: ['Missing Header.txt'],
      });
    });

    it('rejects deprecated formats', async () => {
      const { ingest, tables } = createWorkflowFixture();
      tables.deprecatedExtensions.add('bk2');

      await expect(
        ingest.prepare({ fileName: 'run.bk2', content: MOVIE })
      ).rejects.toThrow('.bk2 movies are no longer accepted');
    });

    it('rejects systems missing from the catalog', async () => {
      const { ingest, parser } = createWorkflowFixture();
      parser.result = parsedMovie({ systemCode: 'SNES' });

      await expect(
        ingest.prepare({ fileName: 'run.bk2', content: MOVIE })
      ).rejects.toThrow('Unknown system type of SNES');
    });
  });
});
