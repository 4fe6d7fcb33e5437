import type { GameSystem, SystemFrameRate } from '@tasflow/domain';

export abstract class SystemCatalog {
  abstract findSystemByCode(code: string): Promise<GameSystem | null>;

  abstract findSystemById(id: number): Promise<GameSystem | null>;

  abstract findFrameRateById(id: number): Promise<SystemFrameRate | null>;

  /** The system's current (non-obsolete) rate for a region. */
  abstract findDefaultFrameRate(
    systemId: number,
    regionCode: string
  ): Promise<SystemFrameRate | null>;

  /**
   * Returns the row for the exact (system, rate, region) triple, creating it
   * when missing. A concurrent creation of the same triple resolves to the
   * row that won.
   */
  abstract findOrCreateFrameRate(
    systemId: number,
    frameRate: number,
    regionCode: string
  ): Promise<SystemFrameRate>;

  abstract isDeprecatedFormat(fileExtension: string): Promise<boolean>;
}
