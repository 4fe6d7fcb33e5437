/**
 * Permission facts consumed by the workflow. How a user comes to hold them
 * (roles, sessions) is decided elsewhere.
 */
export const permissionValues = [
  'submit_movies',
  'judge_submissions',
  'publish_movies',
  'override_submission_constraints',
] as const;

export type Permission = (typeof permissionValues)[number];
