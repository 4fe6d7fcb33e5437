import { formatMovieTime } from '../shared/movieTime';
import { joinNames, splitCsv } from '../shared/names';

export type SubmissionTitleInput = Readonly<{
  id: number;
  authorNames: readonly string[];
  additionalAuthors: string | null;
  systemCode: string | null;
  gameName: string;
  branch: string | null;
  frames: number;
  frameRate: number | null;
}>;

/**
 * `#42: Alice & Bob's NES Some Game "warps" in 04:57.30`
 */
export const generateSubmissionTitle = (input: SubmissionTitleInput): string => {
  const authors = joinNames([
    ...input.authorNames,
    ...splitCsv(input.additionalAuthors),
  ]);
  const system = input.systemCode ? `${input.systemCode} ` : '';
  const branch = input.branch ? ` "${input.branch}"` : '';
  const time = formatMovieTime(input.frames, input.frameRate);
  return `#${input.id}: ${authors}'s ${system}${input.gameName}${branch} in ${time}`;
};
