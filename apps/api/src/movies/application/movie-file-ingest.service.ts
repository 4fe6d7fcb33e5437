import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { Injectable, Logger } from '@nestjs/common';
import JSZip from 'jszip';
import {
  regionCode,
  type HashType,
  type MovieStartType,
  type ParseResult,
} from '@tasflow/domain';
import { MovieParser } from '@collaborators/application/ports/movie-parser';
import { ValidationFailedError } from '@platform/application/errors';
import { WorkflowSettings } from '@platform/application/workflow-settings';
import { WorkflowUnitOfWork } from '@platform/application/workflow-unit-of-work';
import type { NewMovieFile } from './ports/movie-file-repository';

const inflate = promisify(gunzip);

export const MAX_ANNOTATIONS_LENGTH = 3500;
export const MAX_WARNINGS_LENGTH = 500;

const GZIP_SIGNATURE = [0x1f, 0x8b] as const;
const ZIP_SIGNATURE = [0x50, 0x4b, 0x03, 0x04] as const;

const startsWith = (content: Uint8Array, signature: readonly number[]) =>
  content.length >= signature.length &&
  signature.every((byte, index) => content[index] === byte);

export const capWithEllipsis = (text: string, limit: number): string =>
  text.length > limit ? `${text.slice(0, limit - 3)}...` : text;

export type MovieUpload = Readonly<{
  fileName: string;
  content: Uint8Array;
}>;

export type IngestedMovie = Readonly<{
  parseResult: ParseResult;
  /** Canonical storage form: always a zip archive. */
  movieFile: NewMovieFile;
}>;

export type MappedMovie = Readonly<{
  systemId: number;
  systemCode: string;
  systemFrameRateId: number | null;
  frameRate: number | null;
  movieExtension: string;
  movieStartType: MovieStartType;
  frames: number;
  rerecordCount: number;
  cycleCount: number | null;
  annotations: string | null;
  warnings: string | null;
  hashType: HashType | null;
  hash: string | null;
}>;

export type PreparedMovie = IngestedMovie & Readonly<{ mapped: MappedMovie }>;

@Injectable()
export class MovieFileIngestService {
  private readonly logger = new Logger(MovieFileIngestService.name);

  constructor(
    private readonly parser: MovieParser,
    private readonly settings: WorkflowSettings,
    private readonly unitOfWork: WorkflowUnitOfWork
  ) {}

  /**
   * Decompresses gzip transport encoding, dispatches zip uploads to the zip
   * entry point and everything else to the single-file one.
   */
  async parseMovieFileOrZip(upload: MovieUpload): Promise<IngestedMovie> {
    const content = await this.decompress(upload);
    const isZip =
      upload.fileName.toLowerCase().endsWith('.zip') &&
      startsWith(content, ZIP_SIGNATURE);

    const parseResult = isZip
      ? await this.parser.parseZip(content)
      : await this.parser.parse(content, upload.fileName);

    const stored = isZip
      ? content
      : await this.wrapInZip(upload.fileName, content);

    return {
      parseResult,
      movieFile: {
        fileName: upload.fileName,
        content: stored,
        originalLength: content.length,
      },
    };
  }

  /**
   * Maps a successful parse onto the catalog. Returns null when the system
   * code is unknown; throws for a failed parse.
   */
  async mapParsedResult(parseResult: ParseResult): Promise<MappedMovie | null> {
    if (!parseResult.success) {
      throw new ValidationFailedError(
        'The movie file could not be parsed',
        parseResult.errors
      );
    }

    const systems = this.unitOfWork.current().systems;
    const system = await systems.findSystemByCode(parseResult.systemCode);
    if (!system) {
      return null;
    }

    const region = regionCode(parseResult.region);
    const frameRate =
      parseResult.frameRateOverride !== null
        ? await systems.findOrCreateFrameRate(
            system.id,
            parseResult.frameRateOverride,
            region
          )
        : await systems.findDefaultFrameRate(system.id, region);

    const annotations = parseResult.annotations.trim();
    const firstHash = parseResult.hashes[0];

    return {
      systemId: system.id,
      systemCode: system.code,
      systemFrameRateId: frameRate?.id ?? null,
      frameRate: frameRate?.frameRate ?? null,
      movieExtension: parseResult.fileExtension,
      movieStartType: parseResult.startType,
      frames: parseResult.frames,
      rerecordCount: parseResult.rerecordCount,
      cycleCount: parseResult.cycleCount,
      annotations: annotations
        ? capWithEllipsis(annotations, MAX_ANNOTATIONS_LENGTH)
        : null,
      warnings:
        parseResult.warnings.length > 0
          ? capWithEllipsis(parseResult.warnings.join(','), MAX_WARNINGS_LENGTH)
          : null,
      hashType: firstHash?.type ?? null,
      hash: firstHash?.value ?? null,
    };
  }

  /**
   * Full intake path used by submit and movie replacement: parse, reject
   * deprecated formats, map onto the catalog.
   */
  async prepare(upload: MovieUpload): Promise<PreparedMovie> {
    const ingested = await this.parseMovieFileOrZip(upload);
    const { parseResult } = ingested;
    if (!parseResult.success) {
      throw new ValidationFailedError(
        'The movie file could not be parsed',
        parseResult.errors
      );
    }

    const systems = this.unitOfWork.current().systems;
    if (await systems.isDeprecatedFormat(parseResult.fileExtension)) {
      throw new ValidationFailedError(
        `.${parseResult.fileExtension} movies are no longer accepted`
      );
    }

    const mapped = await this.mapParsedResult(parseResult);
    if (!mapped) {
      throw new ValidationFailedError(
        `Unknown system type of ${parseResult.systemCode}`
      );
    }
    return { ...ingested, mapped };
  }

  private async decompress(upload: MovieUpload): Promise<Uint8Array> {
    const ceiling = this.settings.maxDecompressedMovieBytes;
    if (startsWith(upload.content, GZIP_SIGNATURE)) {
      try {
        return new Uint8Array(
          await inflate(upload.content, { maxOutputLength: ceiling })
        );
      } catch (error) {
        if (error instanceof RangeError) {
          throw new ValidationFailedError(
            `The movie file exceeds ${ceiling} bytes once decompressed`
          );
        }
        // Not actually gzip; fall back to the raw bytes.
        this.logger.debug(
          `Gzip decompression of ${upload.fileName} failed, using the raw upload`
        );
      }
    }

    if (upload.content.length > ceiling) {
      throw new ValidationFailedError(`The movie file exceeds ${ceiling} bytes`);
    }
    return upload.content;
  }

  private async wrapInZip(
    fileName: string,
    content: Uint8Array
  ): Promise<Uint8Array> {
    const zip = new JSZip();
    zip.file(fileName, content);
    return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
  }
}
