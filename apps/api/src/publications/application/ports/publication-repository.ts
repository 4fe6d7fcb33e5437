import type {
  NewPublication,
  Publication,
  PublicationHistoryEntry,
} from '@tasflow/domain';

export abstract class PublicationRepository {
  abstract findById(id: number): Promise<Publication | null>;

  abstract movieFileNameExists(movieFileName: string): Promise<boolean>;

  /** Inserts the publication with its children; returns the new id. */
  abstract insert(
    publication: NewPublication,
    provisionalTitle: string
  ): Promise<number>;

  abstract setTitle(id: number, title: string): Promise<void>;

  abstract setObsoletedBy(id: number, obsoletedById: number): Promise<void>;

  /** `obsoletedById` of every publication of the game, keyed by id. */
  abstract obsoletionLinks(gameId: number): Promise<Map<number, number | null>>;

  abstract listHistoryForGame(gameId: number): Promise<PublicationHistoryEntry[]>;
}
