export const SUBMISSION_WIKI_PREFIX = 'InternalSystem/SubmissionContent/S';
export const PUBLICATION_WIKI_PREFIX = 'InternalSystem/PublicationContent/M';

export const submissionWikiPageName = (submissionId: number): string =>
  `${SUBMISSION_WIKI_PREFIX}${submissionId}`;

export const publicationWikiPageName = (publicationId: number): string =>
  `${PUBLICATION_WIKI_PREFIX}${publicationId}`;
