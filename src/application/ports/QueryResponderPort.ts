import { FinancialRecord } from '../../domain/entities/FinancialRecord.js';

export type QueryTopic = 'BANK_BALANCE' | 'MUTUAL_FUNDS' | 'STOCKS' | 'LOAN' | 'CREDIT_SCORE' | 'NET_WORTH';

export type QueryClassification = QueryTopic | 'EMPTY' | 'UNKNOWN';

export interface QueryResponderPort {
  classify(message: string): QueryClassification;
  respond(message: string, record: FinancialRecord, now: Date): string;
}
