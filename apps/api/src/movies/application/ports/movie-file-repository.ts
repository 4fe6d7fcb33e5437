export type StoredMovieFile = Readonly<{
  id: number;
  fileName: string;
  /** Always a zip archive. */
  content: Uint8Array;
  originalLength: number;
  createdAt: Date;
}>;

export type NewMovieFile = Readonly<{
  fileName: string;
  content: Uint8Array;
  originalLength: number;
}>;

export abstract class MovieFileRepository {
  abstract store(file: NewMovieFile): Promise<number>;

  /** Copies the bytes of an existing file into a new record. */
  abstract copy(sourceId: number, fileName: string): Promise<number>;

  abstract findById(id: number): Promise<StoredMovieFile | null>;
}
