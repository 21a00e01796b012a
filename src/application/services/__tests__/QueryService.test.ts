import { describe, expect, it, vi } from 'vitest';
import { FinanceStorePort } from '../../ports/FinanceStorePort.js';
import { InMemoryFinanceStore } from '../../../infrastructure/adapters/storage/InMemoryFinanceStore.js';
import { RuleBasedQueryResponder } from '../../../infrastructure/adapters/responder/RuleBasedQueryResponder.js';
import { silentLogger } from '../../../infrastructure/logging/Logger.js';
import { QueryService } from '../QueryService.js';

const clock = { now: () => new Date(2024, 5, 1, 18, 30, 0) };

const createService = (financeStore: FinanceStorePort) =>
  new QueryService(financeStore, new RuleBasedQueryResponder(), clock, silentLogger());

describe('QueryService', () => {
  const store = new InMemoryFinanceStore({
    '9000000001': { bankBalance: 120000, mutualFunds: 45000, loan: 0 },
  });

  it('answers from the record stored for the trimmed identifier', async () => {
    const service = createService(store);

    await expect(service.respond(' 9000000001 ', 'savings?')).resolves.toBe('Your bank balance is ₹120,000.');
    await expect(service.respond('9000000001', 'loan')).resolves.toBe('You have no active loans or liabilities.');
  });

  it('answers from an empty record for an unknown identifier', async () => {
    const service = createService(store);

    await expect(service.respond('unknown', 'check my stocks')).resolves.toBe(
      "I don't have stock holdings information for you.",
    );
  });

  it('uses the clock for fallback replies', async () => {
    const service = createService(store);

    await expect(service.respond('9000000001', 'hi')).resolves.toBe(
      'I am still Learning, I don\'t have information about it. "hi" — (server time: 2024-06-01 18:30:00)',
    );
  });

  it('skips the lookup for an empty message', async () => {
    const loadRecord = vi.fn(async () => null);
    const service = createService({ loadRecord, saveRecord: vi.fn(async () => undefined) });

    await expect(service.respond('9000000001', ' ')).resolves.toBe("I didn't get that. Please send a message.");
    expect(loadRecord).not.toHaveBeenCalled();
  });

  it('answers from an empty record when the lookup fails', async () => {
    const service = createService({
      loadRecord: vi.fn(async () => {
        throw new Error('disk unavailable');
      }),
      saveRecord: vi.fn(async () => undefined),
    });

    await expect(service.respond('9000000001', 'balance')).resolves.toBe(
      "I don't have your bank balance information.",
    );
  });
});
