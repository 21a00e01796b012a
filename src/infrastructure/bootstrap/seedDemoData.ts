import type { Logger } from 'pino';
import { FinancialRecord } from '../../domain/entities/FinancialRecord.js';
import { UserProfile } from '../../domain/entities/UserProfile.js';
import { parseStoredFinancialRecord } from '../../application/dto/FinancialRecordDTO.js';
import { JsonDocument, JsonDocumentFile } from '../adapters/storage/JsonDocumentFile.js';

export const DEMO_PHONE = '9823533097';

export const demoUsersDocument = (): JsonDocument => ({
  [DEMO_PHONE]: { name: 'Demo User', password: 'demo123' },
});

export const demoFinanceDocument = (): JsonDocument => ({
  [DEMO_PHONE]: {
    bank_balance: 850000,
    mutual_funds: 600000,
    stocks: 400000,
    loan: 300000,
    credit_score: 820,
  },
});

export const demoUserProfile = (): UserProfile => ({
  phone: DEMO_PHONE,
  name: 'Demo User',
  password: 'demo123',
  attributes: {},
});

export const demoFinancialRecord = (): FinancialRecord => parseStoredFinancialRecord(demoFinanceDocument()[DEMO_PHONE]);

/** Writes the starter documents that are missing; existing files are left alone. */
export const seedDemoData = async (
  files: { users: JsonDocumentFile; finance: JsonDocumentFile },
  logger: Logger,
): Promise<void> => {
  if (await files.users.createIfMissing(demoUsersDocument())) {
    logger.info({ file: files.users.filePath }, 'seeded demo users');
  }

  if (await files.finance.createIfMissing(demoFinanceDocument())) {
    logger.info({ file: files.finance.filePath }, 'seeded demo finance records');
  }
};
