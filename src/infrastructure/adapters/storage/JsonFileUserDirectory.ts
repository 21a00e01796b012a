import { z } from 'zod';
import { UserProfile } from '../../../domain/entities/UserProfile.js';
import { UserDirectoryPort } from '../../../application/ports/UserDirectoryPort.js';
import { JsonDocumentFile, setEntry } from './JsonDocumentFile.js';

const StoredUserSchema = z
  .object({
    name: z.string().optional().catch(undefined),
    password: z.string().optional().catch(undefined),
  })
  .passthrough();

export class JsonFileUserDirectory implements UserDirectoryPort {
  constructor(private readonly file: JsonDocumentFile) {}

  async findUser(phone: string): Promise<UserProfile | null> {
    const document = await this.file.read();
    if (!Object.hasOwn(document, phone)) {
      return null;
    }

    const parsed = StoredUserSchema.safeParse(document[phone]);
    if (!parsed.success) {
      // The phone is taken even when its entry is unusable.
      return { phone, attributes: {} };
    }

    const { name, password, phone: _storedPhone, ...attributes } = parsed.data;
    return { phone, name, password, attributes };
  }

  async saveUser(user: UserProfile): Promise<void> {
    const document = await this.file.read();
    setEntry(document, user.phone, {
      ...user.attributes,
      name: user.name,
      phone: user.phone,
      password: user.password,
    });
    await this.file.write(document);
  }
}
