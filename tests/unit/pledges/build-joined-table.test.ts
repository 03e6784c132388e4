import { describe, expect, it } from 'vitest';

import { buildJoinedTable } from '@/modules/pledges/index.js';

import { makePaymentRecord, makePledgeRecord } from '../../fixtures/builders.js';

describe('buildJoinedTable', () => {
  const pledges = [
    makePledgeRecord({ pledge_id: 'p1', contribution_amount: 100 }),
    makePledgeRecord({ pledge_id: 'p2', pledge_created_at: '2023-05-01', contribution_amount: 0 }),
  ];
  const payments = [makePaymentRecord({ pledge_id: 'p1', amount: 40 })];

  it('keeps a pledge whose date is null instead of failing the load', () => {
    const result = buildJoinedTable(
      [
        makePledgeRecord({ pledge_id: 'p1', pledge_created_at: '2023-01-15' }),
        { pledge_id: 'p2', pledge_created_at: null, contribution_amount: 50 },
      ],
      payments
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.records.map(({ pledgeId, year }) => [pledgeId, year])).toEqual([
        ['p1', 2023],
        ['p2', null],
      ]);
    }
  });

  it('left-joins pledges with their payments', () => {
    const result = buildJoinedTable(pledges, payments);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.columns).toEqual([
        'pledge_id',
        'pledge_date',
        'contribution_amount',
        'year',
        'date',
        'amount',
      ]);
      expect(
        result.value.records.map(({ pledgeId, year, contributionAmount, amount }) => ({
          pledgeId,
          year,
          contributionAmount,
          amount,
        }))
      ).toEqual([
        { pledgeId: 'p1', year: 2023, contributionAmount: 100, amount: 40 },
        { pledgeId: 'p2', year: 2023, contributionAmount: 0, amount: null },
      ]);
      expect(result.value.records[0]?.paymentDate?.toISOString()).toBe(
        '2023-04-01T00:00:00.000Z'
      );
      expect(result.value.records[1]?.paymentDate).toBeNull();
    }
  });

  it('is deterministic for the same input', () => {
    expect(buildJoinedTable(pledges, payments)).toEqual(buildJoinedTable(pledges, payments));
  });

  it('keeps every pledge and only those pledges', () => {
    const result = buildJoinedTable(pledges, [
      ...payments,
      makePaymentRecord({ pledge_id: 'p1', amount: 10 }),
      makePaymentRecord({ pledge_id: 'ghost', amount: 500 }),
    ]);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const ids = result.value.records.map((r) => r.pledgeId);
      expect(ids).toEqual(['p1', 'p1', 'p2']);
      expect(new Set(ids)).toEqual(new Set(['p1', 'p2']));
      expect(result.value.records.every((r) => r.year !== null)).toBe(true);
    }
  });

  it('suffixes fields present on both sides', () => {
    const result = buildJoinedTable(
      [makePledgeRecord({ currency: 'EUR' })],
      [makePaymentRecord({ currency: 'USD' })]
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.columns).toContain('currency_pledge');
      expect(result.value.columns).toContain('currency_payment');
      expect(result.value.records[0]?.fields['currency_pledge']).toBe('EUR');
      expect(result.value.records[0]?.fields['currency_payment']).toBe('USD');
    }
  });

  it('reads the pledge year when payments carry their own year field', () => {
    const result = buildJoinedTable([makePledgeRecord()], [makePaymentRecord({ year: 1999 })]);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.records[0]?.year).toBe(2023);
      expect(result.value.records[0]?.fields['year_payment']).toBe(1999);
    }
  });

  it('joins an empty payment document as missing payments', () => {
    const result = buildJoinedTable(pledges, []);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.records.map((r) => r.amount)).toEqual([null, null]);
    }
  });

  it('fails with JoinIntegrityError when payments have no amount', () => {
    const result = buildJoinedTable(pledges, [{ pledge_id: 'p1', date: '2023-04-01' }]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({
        type: 'JoinIntegrityError',
        message: "Could not find 'amount' column after merging pledges with payments",
        field: 'amount',
        columns: ['pledge_id', 'pledge_date', 'contribution_amount', 'year', 'date'],
      });
    }
  });

  it('fails with JoinIntegrityError when pledges carry their own amount', () => {
    const result = buildJoinedTable([makePledgeRecord({ amount: 5 })], payments);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('JoinIntegrityError');
      if (result.error.type === 'JoinIntegrityError') {
        expect(result.error.columns).toContain('amount_pledge');
        expect(result.error.columns).toContain('amount_payment');
      }
    }
  });

  it('fails with SchemaError when a pledge has none of the date fields', () => {
    const result = buildJoinedTable([{ pledge_id: 'p1', contribution_amount: 100 }], payments);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('SchemaError');
    }
  });

  it('returns pledge warnings before payment warnings', () => {
    const result = buildJoinedTable(
      [makePledgeRecord({ contribution_amount: 'n/a' })],
      [makePaymentRecord({ amount: 'unknown' })]
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.warnings.map((w) => `${w.source}.${w.field}`)).toEqual([
        'pledges.contribution_amount',
        'payments.amount',
      ]);
    }
  });
});
