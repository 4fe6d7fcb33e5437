import { Injectable } from '@nestjs/common';
import JSZip from 'jszip';
import { z } from 'zod';
import {
  failedParseResult,
  type MovieHash,
  type MovieStartType,
  type ParseResult,
  type Region,
} from '@tasflow/domain';
import { MovieParser } from '@collaborators/application/ports/movie-parser';
import bk2Platforms from './bk2-platforms.json';

const BK2 = 'bk2';

const platformToSystemCode = new Map(
  Object.entries(z.record(z.string()).parse(bk2Platforms)).map(
    ([platform, systemCode]) => [platform.toUpperCase(), systemCode]
  )
);

const fileExtension = (fileName: string): string => {
  const dot = fileName.lastIndexOf('.');
  return dot >= 0 ? fileName.slice(dot + 1).toLowerCase() : '';
};

const isTrue = (value: string | undefined): boolean =>
  value !== undefined && ['1', 'true'].includes(value.trim().toLowerCase());

type Header = ReadonlyMap<string, string>;

const parseHeader = (text: string): { header: Header; order: string[] } => {
  const header = new Map<string, string>();
  const order: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const space = line.indexOf(' ');
    const key = (space >= 0 ? line.slice(0, space) : line).toLowerCase();
    const value = space >= 0 ? line.slice(space + 1).trim() : '';
    header.set(key, value);
    order.push(key);
  }
  return { header, order };
};

const readText = async (zip: JSZip, name: string): Promise<string | null> => {
  const entry = zip.file(new RegExp(`^${name.replace('.', '\\.')}$`, 'i'))[0];
  return entry ? entry.async('string') : null;
};

/**
 * Reads BizHawk `.bk2` movies: a zip holding `Header.txt` (one `key value`
 * pair per line) and `Input Log.txt` (one `|`-prefixed line per frame).
 */
@Injectable()
export class Bk2MovieParser extends MovieParser {
  async parse(content: Uint8Array, fileName: string): Promise<ParseResult> {
    const extension = fileExtension(fileName);
    if (extension !== BK2) {
      return failedParseResult(
        extension,
        `.${extension || '(none)'} files are not a supported movie format`
      );
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(content);
    } catch {
      return failedParseResult(BK2, 'The .bk2 file is not a valid archive');
    }

    const headerText = await readText(zip, 'Header.txt');
    if (headerText === null) {
      return failedParseResult(BK2, 'Missing Header.txt');
    }
    const inputLog = await readText(zip, 'Input Log.txt');
    if (inputLog === null) {
      return failedParseResult(BK2, 'Missing Input Log.txt');
    }

    const { header, order } = parseHeader(headerText);
    const platform = header.get('platform');
    if (!platform) {
      return failedParseResult(BK2, 'Could not determine the platform');
    }

    let systemCode = platformToSystemCode.get(platform.toUpperCase()) ?? platform;
    if (systemCode === 'GB' && isTrue(header.get('iscgbmode'))) {
      systemCode = 'GBC';
    }

    const warnings: string[] = [];
    const rerecordValue = Number.parseInt(header.get('rerecordcount') ?? '', 10);
    if (Number.isNaN(rerecordValue)) {
      warnings.push('Could not determine the rerecord count');
    }

    const region: Region = isTrue(header.get('pal')) ? 'pal' : 'ntsc';
    const startType: MovieStartType = isTrue(header.get('startsfromsavestate'))
      ? 'savestate'
      : isTrue(header.get('startsfromsaveram'))
        ? 'sram'
        : 'power_on';

    const hashes: MovieHash[] = [];
    for (const key of order) {
      const value = header.get(key);
      if (!value) continue;
      if (key === 'sha1') hashes.push({ type: 'sha1', value });
      if (key === 'md5') hashes.push({ type: 'md5', value });
    }

    const cycleValue = Number.parseInt(header.get('cyclecount') ?? '', 10);
    const frames = inputLog
      .split(/\r?\n/)
      .filter((line) => line.startsWith('|')).length;
    const comments = (await readText(zip, 'Comments.txt')) ?? '';

    return {
      success: true,
      errors: [],
      fileExtension: BK2,
      systemCode,
      region,
      startType,
      frames,
      rerecordCount: Number.isNaN(rerecordValue) ? 0 : rerecordValue,
      frameRateOverride: null,
      cycleCount: Number.isNaN(cycleValue) ? null : cycleValue,
      hashes,
      annotations: comments.trim(),
      warnings,
    };
  }

  async parseZip(content: Uint8Array): Promise<ParseResult> {
    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(content);
    } catch {
      return failedParseResult('zip', 'The zip archive could not be read');
    }
    const entry = Object.values(zip.files).find((file) => !file.dir);
    if (!entry) {
      return failedParseResult('zip', 'The zip archive is empty');
    }
    return this.parse(await entry.async('uint8array'), entry.name);
  }
}
