import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '@platform/infrastructure/database/database.service';
import { RoleGrantor } from '../application/ports/role-grantor';

@Injectable()
export class KyselyRoleGrantor extends RoleGrantor {
  private readonly logger = new Logger(KyselyRoleGrantor.name);

  constructor(private readonly database: DatabaseService) {
    super();
  }

  async assignAutoAssignableRolesByPublication(
    authorIds: readonly number[],
    publicationTitle: string
  ): Promise<void> {
    if (authorIds.length === 0) return;

    const db = this.database.getDb();
    const roles = await db
      .selectFrom('workflow.roles')
      .select('id')
      .where('auto_assign_on_publication', '=', true)
      .execute();
    if (roles.length === 0) return;

    const grants = authorIds.flatMap((userId) =>
      roles.map((role) => ({ user_id: userId, role_id: role.id }))
    );
    const result = await db
      .insertInto('workflow.user_roles')
      .values(grants)
      .onConflict((oc) => oc.columns(['user_id', 'role_id']).doNothing())
      .executeTakeFirst();

    const granted = Number(result.numInsertedOrUpdatedRows ?? 0);
    if (granted > 0) {
      this.logger.log(
        `Granted ${granted} role(s) to the authors of "${publicationTitle}"`
      );
    }
  }
}
