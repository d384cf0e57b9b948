import { z } from "zod";
import { Database, get, ID_COUNTER_NAME } from "./database";

const AllocatedRowSchema = z.object({ id: z.number().int() });

/**
 * Hands out ids from the persisted counter shared by every table.
 * Each call returns the current value and bumps it in the same statement,
 * so ids are never reused across restarts or deletes.
 */
export class IdAllocator {
  constructor(private readonly db: Database) {}

  async next(): Promise<number> {
    const row = get(
      this.db,
      "UPDATE id_counter SET value = value + 1 WHERE name = ? RETURNING value - 1 AS id",
      [ID_COUNTER_NAME]
    );

    if (row === undefined) {
      throw new Error(`Id counter "${ID_COUNTER_NAME}" is missing`);
    }

    return AllocatedRowSchema.parse(row).id;
  }
}
