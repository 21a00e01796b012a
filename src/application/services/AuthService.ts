import { FinancialRecord, emptyFinancialRecord, zeroedFinancialRecord } from '../../domain/entities/FinancialRecord.js';
import { isValidPhone } from '../../domain/services/PhoneIdentifier.js';
import { LoginRequestDTO, RegisterRequestDTO } from '../dto/AuthRequestDTO.js';
import { ServiceError } from '../errors/ServiceError.js';
import { FinanceStorePort } from '../ports/FinanceStorePort.js';
import { UserDirectoryPort } from '../ports/UserDirectoryPort.js';

export interface LoginResult {
  user: {
    phone: string;
    name: string | null;
  };
  finance: FinancialRecord;
}

export class AuthService {
  constructor(
    private readonly users: UserDirectoryPort,
    private readonly financeStore: FinanceStorePort,
  ) {}

  async login(request: LoginRequestDTO): Promise<LoginResult> {
    const phone = request.phone.trim();
    const { password } = request;

    if (!phone || !password) {
      throw new ServiceError(400, 'Missing phone or password');
    }

    const user = await this.users.findUser(phone);
    if (!user || user.password !== password) {
      throw new ServiceError(401, 'Invalid credentials');
    }

    const finance = (await this.financeStore.loadRecord(phone)) ?? emptyFinancialRecord();

    return {
      user: { phone, name: user.name ?? null },
      finance,
    };
  }

  async register(form: RegisterRequestDTO): Promise<void> {
    const { name: rawName, phone: rawPhone, password, ...attributes } = form;
    const name = rawName.trim();
    const phone = rawPhone.trim();

    if (!name || !phone || !password) {
      throw new ServiceError(400, 'Missing name/phone/password');
    }

    if (!isValidPhone(phone)) {
      throw new ServiceError(400, 'Invalid phone');
    }

    if (await this.users.findUser(phone)) {
      throw new ServiceError(409, 'Phone already registered');
    }

    await this.users.saveUser({ phone, name, password, attributes });

    // Registration never overwrites finance data that already exists for the phone.
    if ((await this.financeStore.loadRecord(phone)) === null) {
      await this.financeStore.saveRecord(phone, zeroedFinancialRecord());
    }
  }
}
