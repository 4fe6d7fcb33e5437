export type PublicationHistoryFlag = Readonly<{
  iconPath: string | null;
  linkPath: string | null;
  name: string;
}>;

export type PublicationHistoryEntry = Readonly<{
  id: number;
  title: string;
  goal: string | null;
  createdAt: Date;
  className: string;
  classIconPath: string | null;
  flags: readonly PublicationHistoryFlag[];
  obsoletedById: number | null;
}>;

export type PublicationHistoryNode = PublicationHistoryEntry &
  Readonly<{ obsoletes: readonly PublicationHistoryNode[] }>;

export type PublicationHistoryGroup = Readonly<{
  gameId: number;
  gameDisplayName: string;
  /** Current (non-obsolete) publications, each carrying what it obsoleted. */
  goals: readonly PublicationHistoryNode[];
}>;

type MutableNode = PublicationHistoryEntry & { obsoletes: MutableNode[] };

/**
 * Arranges a game's publications into obsoletion trees.
 *
 * Children are attached through one index keyed by `obsoletedById`, so the
 * whole arrangement is linear in the number of publications.
 */
export const buildPublicationHistory = (
  game: Readonly<{ id: number; displayName: string }>,
  entries: readonly PublicationHistoryEntry[]
): PublicationHistoryGroup => {
  const nodes: MutableNode[] = entries.map((entry) => ({
    ...entry,
    obsoletes: [],
  }));

  const obsoletesByParent = new Map<number, MutableNode[]>();
  for (const node of nodes) {
    if (node.obsoletedById === null) continue;
    const siblings = obsoletesByParent.get(node.obsoletedById);
    if (siblings) {
      siblings.push(node);
    } else {
      obsoletesByParent.set(node.obsoletedById, [node]);
    }
  }

  for (const node of nodes) {
    node.obsoletes = obsoletesByParent.get(node.id) ?? [];
  }

  return {
    gameId: game.id,
    gameDisplayName: game.displayName,
    goals: nodes.filter((node) => node.obsoletedById === null),
  };
};
