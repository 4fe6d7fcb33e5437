const pad2 = (value: number): string => String(value).padStart(2, '0');

const DEFAULT_FRAME_RATE = 60;

/**
 * Formats a movie length as `mm:ss.cc`, or `h:mm:ss.cc` past the hour.
 */
export const formatMovieTime = (
  frames: number,
  frameRate: number | null
): string => {
  const rate = frameRate && frameRate > 0 ? frameRate : DEFAULT_FRAME_RATE;
  const centiseconds = Math.round((frames / rate) * 100);
  const hours = Math.floor(centiseconds / 360_000);
  const minutes = Math.floor((centiseconds % 360_000) / 6_000);
  const seconds = Math.floor((centiseconds % 6_000) / 100);
  const fraction = centiseconds % 100;

  const tail = `${pad2(minutes)}:${pad2(seconds)}.${pad2(fraction)}`;
  return hours > 0 ? `${hours}:${tail}` : tail;
};
