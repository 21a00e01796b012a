import { FinancialRecord } from '../../../domain/entities/FinancialRecord.js';
import { FinanceStorePort } from '../../../application/ports/FinanceStorePort.js';

export class InMemoryFinanceStore implements FinanceStorePort {
  private readonly records = new Map<string, FinancialRecord>();

  constructor(initial: Record<string, FinancialRecord> = {}) {
    for (const [phone, record] of Object.entries(initial)) {
      this.records.set(phone, { ...record });
    }
  }

  async loadRecord(phone: string): Promise<FinancialRecord | null> {
    const record = this.records.get(phone);
    return record ? { ...record } : null;
  }

  async saveRecord(phone: string, record: FinancialRecord): Promise<void> {
    this.records.set(phone, { ...record });
  }
}
