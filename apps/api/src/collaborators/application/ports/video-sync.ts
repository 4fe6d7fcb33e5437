export type VideoDescriptor = Readonly<{
  publicationId: number;
  url: string;
  /** Label of the watch link, set for alternate encodes. */
  displayName: string | null;
  title: string;
  /** Markup of the publication's wiki page. */
  description: string | null;
  systemCode: string;
  gameDisplayName: string;
  authorNames: readonly string[];
  publishedAt: Date;
  obsoletedById: number | null;
}>;

/** Keeps externally hosted encodes in line with their publication. */
export abstract class VideoSync {
  abstract isRecognizedUrl(url: string): boolean;

  abstract sync(video: VideoDescriptor): Promise<void>;

  /** Embeddable form of a recognized watch URL; other URLs are returned as-is. */
  abstract convertToEmbedLink(url: string): string;
}
