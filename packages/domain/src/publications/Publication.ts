export const publicationUrlTypeValues = ['streaming', 'mirror'] as const;
export type PublicationUrlType = (typeof publicationUrlTypeValues)[number];

export type PublicationUrl = Readonly<{
  url: string;
  type: PublicationUrlType;
  displayName: string | null;
}>;

export type PublicationAuthor = Readonly<{
  userId: number;
  userName: string;
  ordinal: number;
}>;

export type Publication = Readonly<{
  id: number;
  title: string;
  submissionId: number;
  publicationClassId: number;
  systemId: number;
  systemFrameRateId: number;
  gameId: number;
  gameVersionId: number;
  gameGoalId: number;
  emulatorVersion: string | null;
  frames: number;
  rerecordCount: number;
  movieFileName: string;
  movieFileId: number;
  additionalAuthors: string | null;
  obsoletedById: number | null;
  authors: readonly PublicationAuthor[];
  flagIds: readonly number[];
  tagIds: readonly number[];
  urls: readonly PublicationUrl[];
  createdAt: Date;
}>;

/** A publication before its first save assigns the id (and with it the title). */
export type NewPublication = Omit<Publication, 'id' | 'title' | 'createdAt'>;

export const buildPublicationUrls = (params: {
  onlineWatchingUrl: string;
  alternateOnlineWatchingUrl?: string | null;
  alternateOnlineWatchUrlName?: string | null;
  mirrorSiteUrl?: string | null;
}): PublicationUrl[] => {
  const urls: PublicationUrl[] = [
    { url: params.onlineWatchingUrl, type: 'streaming', displayName: null },
  ];
  const mirror = params.mirrorSiteUrl?.trim();
  if (mirror) {
    urls.push({ url: mirror, type: 'mirror', displayName: null });
  }
  const alternate = params.alternateOnlineWatchingUrl?.trim();
  if (alternate) {
    urls.push({
      url: alternate,
      type: 'streaming',
      displayName: params.alternateOnlineWatchUrlName?.trim() || null,
    });
  }
  return urls;
};

export const streamingUrls = (
  urls: readonly PublicationUrl[]
): PublicationUrl[] => urls.filter((url) => url.type === 'streaming');

export const orderedAuthorNames = (
  authors: readonly PublicationAuthor[]
): string[] =>
  [...authors]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map((author) => author.userName);
