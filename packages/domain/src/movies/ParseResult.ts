export const regionValues = ['ntsc', 'pal', 'dendy'] as const;
export type Region = (typeof regionValues)[number];

export const movieStartTypeValues = ['power_on', 'sram', 'savestate'] as const;
export type MovieStartType = (typeof movieStartTypeValues)[number];

export const hashTypeValues = ['md5', 'sha1', 'sha256', 'crc32'] as const;
export type HashType = (typeof hashTypeValues)[number];

export type MovieHash = Readonly<{ type: HashType; value: string }>;

/**
 * What a movie parser reports about a single movie file. Parsers for the
 * individual formats live outside this package; the workflow only relies on
 * this shape.
 */
export type ParseResult = Readonly<{
  success: boolean;
  errors: readonly string[];
  fileExtension: string;
  systemCode: string;
  region: Region;
  startType: MovieStartType;
  frames: number;
  rerecordCount: number;
  /** Set by formats that record their own frame rate. */
  frameRateOverride: number | null;
  cycleCount: number | null;
  /** In the order the format declares them; the first one is stored. */
  hashes: readonly MovieHash[];
  annotations: string;
  warnings: readonly string[];
}>;

export const failedParseResult = (
  fileExtension: string,
  ...errors: string[]
): ParseResult => ({
  success: false,
  errors,
  fileExtension,
  systemCode: '',
  region: 'ntsc',
  startType: 'power_on',
  frames: 0,
  rerecordCount: 0,
  frameRateOverride: null,
  cycleCount: null,
  hashes: [],
  annotations: '',
  warnings: [],
});

export const regionCode = (region: Region): string => region.toUpperCase();

export const isMovieStartType = (value: string): value is MovieStartType =>
  movieStartTypeValues.some((startType) => startType === value);

export const isHashType = (value: string): value is HashType =>
  hashTypeValues.some((hashType) => hashType === value);
