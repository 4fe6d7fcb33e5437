// Shared
export * from './shared/Assert';
export * from './shared/vos/NumericId';
export * from './shared/movieTime';
export * from './shared/names';

// Identity
export * from './identity/UserId';
export * from './identity/Permission';
export * from './identity/Actor';

// Games & movies
export * from './games/GameSystem';
export * from './movies/ParseResult';
export * from './wiki/pageNames';

// Submissions
export * from './submissions/SubmissionStatus';
export * from './submissions/Submission';
export * from './submissions/SubmissionTitle';
export * from './submissions/claimTransitions';
export * from './submissions/authorization/judgingWindow';
export * from './submissions/authorization/statusGuards';
export * from './submissions/authorization/availableStatuses';

// Publications
export * from './publications/Publication';
export * from './publications/PublicationTitle';
export * from './publications/PublicationHistory';
export * from './publications/obsoletion';
