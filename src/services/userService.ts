import { IdAllocator } from "../db/idAllocator";
import { RecordStore } from "../db/recordStore";
import { NotFoundError } from "../errors";
import { User, UserPayload } from "../types";
import { Clock } from "./clock";

export class UserService {
  constructor(
    private readonly users: RecordStore<User>,
    private readonly ids: IdAllocator,
    private readonly now: Clock
  ) {}

  async getAllUsers(): Promise<User[]> {
    return this.users.getAll();
  }

  async getUserById(id: number): Promise<User> {
    const user = await this.users.get(id);
    if (!user) {
      throw new NotFoundError("user", id);
    }
    return user;
  }

  async createUser(payload: UserPayload): Promise<User> {
    const user: User = {
      id: await this.ids.next(),
      name: payload.name,
      email: payload.email,
      createdAt: this.now(),
      updatedAt: null,
    };

    await this.users.insert(user);
    return user;
  }

  async updateUser(id: number, payload: UserPayload): Promise<User> {
    const existing = await this.getUserById(id);

    const user: User = {
      id,
      name: payload.name,
      email: payload.email,
      createdAt: existing.createdAt,
      updatedAt: this.now(),
    };

    if (!(await this.users.replace(user))) {
      throw new NotFoundError("user", id);
    }
    return user;
  }

  async deleteUser(id: number): Promise<User> {
    const removed = await this.users.remove(id);
    if (!removed) {
      throw new NotFoundError("user", id);
    }
    return removed;
  }
}
