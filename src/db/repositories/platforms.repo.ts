import { asc, eq } from "drizzle-orm";
import type { Platform } from "../schema";
import { platforms } from "../schema";
import type { DatabaseClient } from "../client";

export class PlatformsRepository {
  constructor(private readonly client: DatabaseClient) {}

  async listAll(): Promise<Platform[]> {
    return this.client.transaction("list_platforms", (db) =>
      db.select().from(platforms).orderBy(asc(platforms.id)).all()
    );
  }

  async findById(id: number): Promise<Platform | null> {
    return this.client.transaction("find_platform", (db) => {
      const result = db.select().from(platforms).where(eq(platforms.id, id)).get();
      return result ?? null;
    });
  }

  async findByCode(code: string): Promise<Platform | null> {
    return this.client.transaction("find_platform_by_code", (db) => {
      const result = db.select().from(platforms).where(eq(platforms.code, code)).get();
      return result ?? null;
    });
  }
}
