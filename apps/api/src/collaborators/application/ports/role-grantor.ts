export abstract class RoleGrantor {
  abstract assignAutoAssignableRolesByPublication(
    authorIds: readonly number[],
    publicationTitle: string
  ): Promise<void>;
}
