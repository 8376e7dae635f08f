import type { User } from '../../shared/types/user';

/**
 * Account storage consumed by the rating updater.
 */
export interface UserRepository {
  getById(id: string): Promise<User | null>;
  getByUsername(username: string): Promise<User | null>;
  getByEmail(email: string): Promise<User | null>;
  /** Add `delta` to the stored rating in one step and return the updated user. */
  applyRatingDelta(id: string, delta: number): Promise<User>;
}

export class UserNotFoundError extends Error {
  constructor(public readonly userId: string) {
    super(`User not found: ${userId}`);
    this.name = 'UserNotFoundError';
    Object.setPrototypeOf(this, UserNotFoundError.prototype);
  }
}

/**
 * Map-backed repository for development without a database, and for tests.
 */
export class InMemoryUserRepository implements UserRepository {
  private readonly users = new Map<string, User>();

  constructor(seed: User[] = []) {
    for (const user of seed) {
      this.users.set(user.id, { ...user });
    }
  }

  public async getById(id: string): Promise<User | null> {
    const user = this.users.get(id);
    return user ? { ...user } : null;
  }

  public async getByUsername(username: string): Promise<User | null> {
    return this.findOne((user) => user.username === username);
  }

  public async getByEmail(email: string): Promise<User | null> {
    const needle = email.toLowerCase();
    return this.findOne((user) => user.email.toLowerCase() === needle);
  }

  public async applyRatingDelta(id: string, delta: number): Promise<User> {
    const user = this.users.get(id);
    if (!user) {
      throw new UserNotFoundError(id);
    }
    const updated = { ...user, rating: user.rating + delta, updatedAt: new Date() };
    this.users.set(id, updated);
    return { ...updated };
  }

  /** Insert or replace a user record. */
  public upsert(user: User): void {
    this.users.set(user.id, { ...user });
  }

  private findOne(predicate: (user: User) => boolean): User | null {
    for (const user of this.users.values()) {
      if (predicate(user)) {
        return { ...user };
      }
    }
    return null;
  }
}
