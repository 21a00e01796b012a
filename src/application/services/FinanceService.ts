import { FinancialRecord, emptyFinancialRecord } from '../../domain/entities/FinancialRecord.js';
import { isValidPhone } from '../../domain/services/PhoneIdentifier.js';
import { FinanceUpdateSchema, applyFinanceUpdate } from '../dto/FinancialRecordDTO.js';
import { ServiceError } from '../errors/ServiceError.js';
import { FinanceStorePort } from '../ports/FinanceStorePort.js';

export class FinanceService {
  constructor(private readonly financeStore: FinanceStorePort) {}

  async getRecord(phone: string): Promise<FinancialRecord> {
    return (await this.financeStore.loadRecord(phone.trim())) ?? emptyFinancialRecord();
  }

  async updateRecord(phone: string, updates: unknown): Promise<FinancialRecord> {
    const key = phone.trim();
    if (!key) {
      throw new ServiceError(400, 'Missing phone');
    }

    if (!isValidPhone(key)) {
      throw new ServiceError(400, 'Invalid phone');
    }

    if (!this.hasEntries(updates)) {
      throw new ServiceError(400, 'No data provided');
    }

    const parsed = FinanceUpdateSchema.safeParse(updates);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
      throw new ServiceError(400, `Invalid finance data: ${details}`);
    }

    const existing = (await this.financeStore.loadRecord(key)) ?? emptyFinancialRecord();
    const merged = applyFinanceUpdate(existing, parsed.data);
    await this.financeStore.saveRecord(key, merged);

    return merged;
  }

  private hasEntries(value: unknown): boolean {
    return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
  }
}
