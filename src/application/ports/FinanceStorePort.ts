import { FinancialRecord } from '../../domain/entities/FinancialRecord.js';

export interface FinanceStorePort {
  loadRecord(phone: string): Promise<FinancialRecord | null>;
  saveRecord(phone: string, record: FinancialRecord): Promise<void>;
}
