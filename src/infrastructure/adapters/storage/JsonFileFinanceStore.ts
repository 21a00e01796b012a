import { FinancialRecord } from '../../../domain/entities/FinancialRecord.js';
import { parseStoredFinancialRecord, toStoredFinancialRecord } from '../../../application/dto/FinancialRecordDTO.js';
import { FinanceStorePort } from '../../../application/ports/FinanceStorePort.js';
import { JsonDocumentFile, setEntry } from './JsonDocumentFile.js';

export class JsonFileFinanceStore implements FinanceStorePort {
  constructor(private readonly file: JsonDocumentFile) {}

  async loadRecord(phone: string): Promise<FinancialRecord | null> {
    const document = await this.file.read();
    if (!Object.hasOwn(document, phone)) {
      return null;
    }

    return parseStoredFinancialRecord(document[phone]);
  }

  async saveRecord(phone: string, record: FinancialRecord): Promise<void> {
    const document = await this.file.read();
    setEntry(document, phone, toStoredFinancialRecord(record));
    await this.file.write(document);
  }
}
