import { Assert } from '../shared/Assert';
import type { Permission } from './Permission';
import { UserId } from './UserId';

/**
 * The user performing a workflow operation, with the permissions resolved
 * for the current request.
 */
export type Actor = Readonly<{
  userId: UserId;
  userName: string;
  permissions: ReadonlySet<Permission>;
}>;

export const actor = (
  userId: number,
  userName: string,
  permissions: Iterable<Permission> = []
): Actor => {
  Assert.that(userName, 'UserName').isNonEmpty();
  return {
    userId: UserId.from(userId),
    userName,
    permissions: new Set(permissions),
  };
};
