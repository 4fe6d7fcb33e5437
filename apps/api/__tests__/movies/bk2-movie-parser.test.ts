import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { Bk2MovieParser } from '../../src/movies/infrastructure/bk2-movie-parser';

const HEADER = [
  'MovieVersion BizHawk v2.0.0',
  'Platform NES',
  'GameName Some Game',
  'SHA1 EA343F4E445A9050D4B4FBAC2C77D0693B1D0922',
  'rerecordCount 1234',
  'StartsFromSavestate False',
].join('\n');

const INPUT_LOG = [
  '[Input]',
  'LogKey:#Reset|Power|#P1 Up|',
  '|..|........|',
  '|..|U.......|',
  '|..|........|',
  '[/Input]',
].join('\r\n');

const bk2 = async (files: Record<string, string>): Promise<Uint8Array> => {
  const zip = new JSZip();
  for (const [name, text] of Object.entries(files)) {
    zip.file(name, text);
  }
  return zip.generateAsync({ type: 'uint8array' });
};

describe('Bk2MovieParser', () => {
  const parser = new Bk2MovieParser();

  it('reads the header and counts input frames', async () => {
    const content = await bk2({
      'Header.txt': HEADER,
      'Input Log.txt': INPUT_LOG,
      'Comments.txt': '  first comment \n',
    });

    const result = await parser.parse(content, 'Run.BK2');

    expect(result).toEqual({
      success: true,
      errors: [],
      fileExtension: 'bk2',
      systemCode: 'NES',
      region: 'ntsc',
      startType: 'power_on',
      frames: 3,
      rerecordCount: 1234,
      frameRateOverride: null,
      cycleCount: null,
      hashes: [
        { type: 'sha1', value: 'EA343F4E445A9050D4B4FBAC2C77D0693B1D0922' },
      ],
      annotations: 'first comment',
      warnings: [],
    });
  });

  it('detects colour Game Boy mode, PAL, savestate starts and cycle counts', async () => {
    const content = await bk2({
      'Header.txt': [
        'Platform GB',
        'IsCGBMode 1',
        'PAL True',
        'StartsFromSavestate True',
        'CycleCount 987654',
        'rerecordCount 5',
      ].join('\n'),
      'Input Log.txt': '|.|\n|.|\n',
    });

    const result = await parser.parse(content, 'run.bk2');

    expect(result.systemCode).toBe('GBC');
    expect(result.region).toBe('pal');
    expect(result.startType).toBe('savestate');
    expect(result.cycleCount).toBe(987654);
    expect(result.frames).toBe(2);
  });

  it('warns when the rerecord count is missing', async () => {
    const content = await bk2({
      'Header.txt': 'Platform NES',
      'Input Log.txt': INPUT_LOG,
    });

    const result = await parser.parse(content, 'run.bk2');

    expect(result.success).toBe(true);
    expect(result.rerecordCount).toBe(0);
    expect(result.warnings).toEqual(['Could not determine the rerecord count']);
  });

  it('rejects other movie formats by extension', async () => {
    const result = await parser.parse(new Uint8Array([1, 2, 3]), 'run.fm2');

    expect(result.success).toBe(false);
    expect(result.fileExtension).toBe('fm2');
    expect(result.errors).toEqual(['.fm2 files are not a supported movie format']);
  });

  it('reports a bk2 that is not an archive', async () => {
    const result = await parser.parse(new Uint8Array([1, 2, 3]), 'run.bk2');

    expect(result.errors).toEqual(['The .bk2 file is not a valid archive']);
  });

  it('reports missing archive members', async () => {
    const noHeader = await bk2({ 'Input Log.txt': INPUT_LOG });
    const noLog = await bk2({ 'Header.txt': HEADER });
    const noPlatform = await bk2({
      'Header.txt': 'rerecordCount 1',
      'Input Log.txt': INPUT_LOG,
    });

    expect((await parser.parse(noHeader, 'run.bk2')).errors).toEqual([
      'Missing Header.txt',
    ]);
    expect((await parser.parse(noLog, 'run.bk2')).errors).toEqual([
      'Missing Input Log.txt',
    ]);
    expect((await parser.parse(noPlatform, 'run.bk2')).errors).toEqual([
      'Could not determine the platform',
    ]);
  });

  describe('parseZip', () => {
    it('parses the first file of the archive', async () => {
      const movie = await bk2({ 'Header.txt': HEADER, 'Input Log.txt': INPUT_LOG });
      const outer = new JSZip();
      outer.file('run.bk2', movie);
      const content = await outer.generateAsync({ type: 'uint8array' });

      const result = await parser.parseZip(content);

      expect(result.success).toBe(true);
      expect(result.frames).toBe(3);
      expect(result.rerecordCount).toBe(1234);
    });

    it('rejects an empty archive', async () => {
      const content = await new JSZip().generateAsync({ type: 'uint8array' });

      const result = await parser.parseZip(content);

      expect(result.errors).toEqual(['The zip archive is empty']);
    });
  });
});
