export type WikiPage = Readonly<{
  pageName: string;
  revision: number;
  markup: string;
  authorId: number;
  revisionMessage: string | null;
  minorEdit: boolean;
  createdAt: Date;
}>;

export type NewWikiRevision = Readonly<{
  pageName: string;
  markup: string;
  authorId: number;
  revisionMessage: string;
  minorEdit?: boolean;
}>;

/** Revisioned wiki pages. `add` always creates a new current revision. */
export abstract class WikiPages {
  abstract add(revision: NewWikiRevision): Promise<WikiPage>;

  abstract page(pageName: string): Promise<WikiPage | null>;
}
