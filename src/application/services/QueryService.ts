import type { Logger } from 'pino';
import { FinancialRecord, emptyFinancialRecord } from '../../domain/entities/FinancialRecord.js';
import { ClockPort } from '../ports/ClockPort.js';
import { FinanceStorePort } from '../ports/FinanceStorePort.js';
import { QueryResponderPort } from '../ports/QueryResponderPort.js';

export class QueryService {
  constructor(
    private readonly financeStore: FinanceStorePort,
    private readonly responder: QueryResponderPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async respond(identifier: string, message: string): Promise<string> {
    const phone = identifier.trim();
    const topic = this.responder.classify(message);
    const record = topic === 'EMPTY' ? emptyFinancialRecord() : await this.loadRecord(phone);

    const reply = this.responder.respond(message, record, this.clock.now());
    this.logger.info({ phone, topic }, 'query answered');

    return reply;
  }

  private async loadRecord(phone: string): Promise<FinancialRecord> {
    try {
      return (await this.financeStore.loadRecord(phone)) ?? emptyFinancialRecord();
    } catch (error) {
      this.logger.warn({ phone, err: error }, 'finance lookup failed, answering from an empty record');
      return emptyFinancialRecord();
    }
  }
}
