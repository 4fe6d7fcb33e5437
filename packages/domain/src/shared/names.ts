/** "A", "A & B", "A, B & C" */
export const joinNames = (names: readonly string[]): string => {
  if (names.length <= 1) {
    return names[0] ?? '';
  }
  const head = names.slice(0, -1).join(', ');
  return `${head} & ${names[names.length - 1]}`;
};

/** Normalizes a free-text comma separated list: trimmed, empties dropped. */
export const normalizeCsv = (value: string | null | undefined): string | null => {
  if (!value) {
    return null;
  }
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  return parts.length > 0 ? parts.join(', ') : null;
};

export const splitCsv = (value: string | null): string[] =>
  value
    ? value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    : [];
