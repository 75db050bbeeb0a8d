import type { QueryExecutor } from "../database/client";
import { GetUserResponseSchema } from "../schemas/store";
import { BaseRepository } from "./base";

export interface UserRecord {
  userId: string;
  name: string;
}

export class UserRepository extends BaseRepository {
  constructor(client: QueryExecutor) {
    super(client);
  }

  async getUser(userId: string): Promise<UserRecord | undefined> {
    const response = await this.find(
      "getUser",
      { user_id: userId },
      GetUserResponseSchema,
      { noRetry: true },
    );
    const user = response?.user;
    return user ? { userId: user.user_id, name: user.name } : undefined;
  }

  async addUser(userId: string, name: string): Promise<void> {
    await this.command("addUser", { user_id: userId, name });
  }

  /**
   * Writes the OWNS edge; `internalMemoryId` is the store-issued id of the memory node.
   */
  async linkUserToMemory(
    userId: string,
    internalMemoryId: string,
    context = "created",
  ): Promise<void> {
    await this.command("linkUserToMemory", {
      user_id: userId,
      memory_id: internalMemoryId,
      context,
    });
  }
}
