export type UserSummary = Readonly<{ id: number; userName: string }>;

export abstract class UserRepository {
  /** Users matching the names, in no particular order; unknown names are absent. */
  abstract findByUserNames(userNames: readonly string[]): Promise<UserSummary[]>;
}
