import { UserProfile } from '../../../domain/entities/UserProfile.js';
import { UserDirectoryPort } from '../../../application/ports/UserDirectoryPort.js';

export class InMemoryUserDirectory implements UserDirectoryPort {
  private readonly users = new Map<string, UserProfile>();

  constructor(initial: UserProfile[] = []) {
    for (const user of initial) {
      this.users.set(user.phone, user);
    }
  }

  async findUser(phone: string): Promise<UserProfile | null> {
    return this.users.get(phone) ?? null;
  }

  async saveUser(user: UserProfile): Promise<void> {
    this.users.set(user.phone, user);
  }
}
