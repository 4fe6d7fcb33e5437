import { formatMovieTime } from '../shared/movieTime';
import { joinNames, splitCsv } from '../shared/names';

export type PublicationTitleInput = Readonly<{
  id: number;
  systemCode: string;
  gameDisplayName: string;
  goal: string | null;
  authorNames: readonly string[];
  additionalAuthors: string | null;
  frames: number;
  frameRate: number;
}>;

/** The default goal of a game is implied and left out of titles. */
const BASELINE_GOAL = 'baseline';

/**
 * `[1234] NES Some Game "warps" by Alice & Bob in 04:57.30`
 *
 * The id is part of the title, so it can only be generated after the first
 * save.
 */
export const generatePublicationTitle = (
  input: PublicationTitleInput
): string => {
  const authors = joinNames([
    ...input.authorNames,
    ...splitCsv(input.additionalAuthors),
  ]);
  const goal =
    input.goal && input.goal.toLowerCase() !== BASELINE_GOAL
      ? ` "${input.goal}"`
      : '';
  const time = formatMovieTime(input.frames, input.frameRate);
  return `[${input.id}] ${input.systemCode} ${input.gameDisplayName}${goal} by ${authors} in ${time}`;
};
