import { and, asc, eq } from "drizzle-orm";
import type { Account, NewAccount } from "../schema";
import { accounts } from "../schema";
import type { DatabaseClient } from "../client";
import type { Logger } from "../../core/logger";
import { systemClock, unixSeconds, type Clock } from "../../core/time";
import { UNASSIGNED_IDENTITY } from "../../domain/models";

export interface AccountUpsert {
  platformId: number;
  nativeId: string;
  displayName?: string;
  identityTag?: string;
  avatar?: string;
}

export class AccountsRepository {
  private readonly logger: Logger;

  constructor(
    private readonly client: DatabaseClient,
    logger: Logger,
    private readonly clock: Clock = systemClock
  ) {
    this.logger = logger.child({ component: "accounts-repo" });
  }

  /**
   * Inserts the account when absent. For an existing account only the
   * non-empty supplied fields are written, so a crawl that carries no tag
   * never clears one assigned by the operator. `updated_at` always moves.
   */
  async upsert(input: AccountUpsert): Promise<number> {
    const now = unixSeconds(this.clock());

    return this.client.transaction("upsert_account", (db) => {
      const existing = db
        .select({ id: accounts.id })
        .from(accounts)
        .where(and(eq(accounts.platformId, input.platformId), eq(accounts.nativeId, input.nativeId)))
        .get();

      if (!existing) {
        const created = db
          .insert(accounts)
          .values({
            platformId: input.platformId,
            nativeId: input.nativeId,
            displayName: input.displayName ?? "",
            identityTag: input.identityTag ? input.identityTag : UNASSIGNED_IDENTITY,
            avatar: input.avatar ?? "",
            createdAt: now,
            updatedAt: now,
          })
          .returning({ id: accounts.id })
          .get();
        this.logger.info(
          { accountId: created.id, platformId: input.platformId, nativeId: input.nativeId },
          "Account created"
        );
        return created.id;
      }

      const changes: Partial<NewAccount> = { updatedAt: now };
      if (input.displayName) changes.displayName = input.displayName;
      if (input.identityTag) changes.identityTag = input.identityTag;
      if (input.avatar) changes.avatar = input.avatar;

      db.update(accounts).set(changes).where(eq(accounts.id, existing.id)).run();
      this.logger.debug({ accountId: existing.id, fields: Object.keys(changes) }, "Account updated");
      return existing.id;
    });
  }

  /** Re-tags one account. Historical snapshots keep the tag they were written with. */
  async setIdentityTag(platformId: number, nativeId: string, tag: string): Promise<boolean> {
    const now = unixSeconds(this.clock());
    const updated = this.client.transaction("set_identity_tag", (db) =>
      db
        .update(accounts)
        .set({ identityTag: tag, updatedAt: now })
        .where(and(eq(accounts.platformId, platformId), eq(accounts.nativeId, nativeId)))
        .run()
    );

    if (updated.changes === 0) {
      this.logger.warn({ platformId, nativeId }, "No account to tag");
      return false;
    }
    this.logger.info({ platformId, nativeId, tag }, "Identity tag updated");
    return true;
  }

  async findById(id: number): Promise<Account | null> {
    return this.client.transaction("find_account", (db) => {
      const result = db.select().from(accounts).where(eq(accounts.id, id)).get();
      return result ?? null;
    });
  }

  async findByNativeId(platformId: number, nativeId: string): Promise<Account | null> {
    return this.client.transaction("find_account_by_native_id", (db) => {
      const result = db
        .select()
        .from(accounts)
        .where(and(eq(accounts.platformId, platformId), eq(accounts.nativeId, nativeId)))
        .get();
      return result ?? null;
    });
  }

  async list(platformId?: number): Promise<Account[]> {
    return this.client.transaction("list_accounts", (db) => {
      return db
        .select()
        .from(accounts)
        .where(platformId === undefined ? undefined : eq(accounts.platformId, platformId))
        .orderBy(asc(accounts.platformId), asc(accounts.id))
        .all();
    });
  }
}
