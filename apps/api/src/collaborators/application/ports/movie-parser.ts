import type { ParseResult } from '@tasflow/domain';

export abstract class MovieParser {
  abstract parse(content: Uint8Array, fileName: string): Promise<ParseResult>;

  /** Parses the movie contained in a zip archive. */
  abstract parseZip(content: Uint8Array): Promise<ParseResult>;
}
