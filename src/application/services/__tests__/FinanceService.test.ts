import { describe, expect, it } from 'vitest';
import { InMemoryFinanceStore } from '../../../infrastructure/adapters/storage/InMemoryFinanceStore.js';
import { FinanceService } from '../FinanceService.js';

describe('FinanceService', () => {
  it('returns an empty record for an unknown phone', async () => {
    const service = new FinanceService(new InMemoryFinanceStore());

    await expect(service.getRecord('9000000009')).resolves.toEqual({});
  });

  it('trims the phone before looking it up', async () => {
    const service = new FinanceService(new InMemoryFinanceStore({ '9000000001': { stocks: 10 } }));

    await expect(service.getRecord(' 9000000001 ')).resolves.toEqual({ stocks: 10 });
  });

  it('merges updates into the existing record', async () => {
    const store = new InMemoryFinanceStore({ '9000000001': { bankBalance: 100, loan: 5 } });
    const service = new FinanceService(store);

    const merged = await service.updateRecord('9000000001', { stocks: 20, loan: 0 });

    expect(merged).toEqual({ bankBalance: 100, stocks: 20, loan: 0 });
    await expect(store.loadRecord('9000000001')).resolves.toEqual({ bankBalance: 100, stocks: 20, loan: 0 });
  });

  it('removes a field updated to null', async () => {
    const store = new InMemoryFinanceStore({ '9000000001': { bankBalance: 100, creditScore: 700 } });
    const service = new FinanceService(store);

    await expect(service.updateRecord('9000000001', { credit_score: null })).resolves.toEqual({ bankBalance: 100 });
  });

  it('creates a record for a phone without one', async () => {
    const store = new InMemoryFinanceStore();
    const service = new FinanceService(store);

    await service.updateRecord('9000000002', { mutual_funds: 3000 });

    await expect(store.loadRecord('9000000002')).resolves.toEqual({ mutualFunds: 3000 });
  });

  it('rejects an empty update', async () => {
    const service = new FinanceService(new InMemoryFinanceStore());

    await expect(service.updateRecord('9000000001', {})).rejects.toMatchObject({
      status: 400,
      message: 'No data provided',
    });
    await expect(service.updateRecord('9000000001', null)).rejects.toMatchObject({
      status: 400,
      message: 'No data provided',
    });
  });

  it('rejects values that are not integers', async () => {
    const service = new FinanceService(new InMemoryFinanceStore());

    await expect(service.updateRecord('9000000001', { loan: 'a lot' })).rejects.toMatchObject({ status: 400 });
    await expect(service.updateRecord('9000000001', { loan: 10.5 })).rejects.toThrow(/^Invalid finance data: loan:/);
  });

  it('rejects identifiers that are not phone numbers', async () => {
    const store = new InMemoryFinanceStore();
    const service = new FinanceService(store);

    await expect(service.updateRecord('__proto__', { stocks: 5 })).rejects.toMatchObject({
      status: 400,
      message: 'Invalid phone',
    });
    await expect(service.updateRecord('not-a-phone', { stocks: 5 })).rejects.toMatchObject({ status: 400 });
    await expect(store.loadRecord('__proto__')).resolves.toBeNull();
  });

  it('rejects unknown fields', async () => {
    const service = new FinanceService(new InMemoryFinanceStore());

    await expect(service.updateRecord('9000000001', { gold: 5 })).rejects.toThrow(/^Invalid finance data: /);
  });
});
