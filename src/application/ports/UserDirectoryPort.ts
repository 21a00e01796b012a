import { UserProfile } from '../../domain/entities/UserProfile.js';

export interface UserDirectoryPort {
  findUser(phone: string): Promise<UserProfile | null>;
  saveUser(user: UserProfile): Promise<void>;
}
