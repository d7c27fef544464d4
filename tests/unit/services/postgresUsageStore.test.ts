import { describe, it, expect, vi, beforeEach } from 'vitest';

// =====================================================
// Mocks: vi.hoisted() runs before vi.mock() hoisting
// =====================================================

const { mockSql, mockTx } = vi.hoisted(() => {
  const mockTx = vi.fn((_strings: TemplateStringsArray, ..._values: unknown[]) =>
    Promise.resolve([] as unknown[])
  );

  const mockSql = Object.assign(
    vi.fn((_strings: TemplateStringsArray, ..._values: unknown[]) => Promise.resolve([] as unknown[])),
    {
      begin: vi.fn(async (fn: (tx: typeof mockTx) => Promise<unknown>) => fn(mockTx)),
    }
  );

  return { mockSql, mockTx };
});

vi.mock('@/db/client', () => ({
  sql: mockSql,
  hashToInt: (input: string) => input.length,
}));

// Import after mocks
import { PostgresUsageStore } from '@/services/usageLedger.service';

const ACCOUNT = '33333333-3333-3333-3333-333333333333';
const PERIOD = {
  start: new Date('2026-03-01T00:00:00Z'),
  end: new Date('2026-04-01T00:00:00Z'),
};

function input(limit: number, cost = 1) {
  return {
    accountId: ACCOUNT,
    usageType: 'exports' as const,
    period: PERIOD,
    subscriptionId: null,
    endpointClass: 'export',
    cost,
    limit,
  };
}

function queryText(call: unknown[]): string {
  const strings = call[0];
  return Array.isArray(strings) ? strings.join('?') : '';
}

describe('PostgresUsageStore', () => {
  let store: PostgresUsageStore;

  beforeEach(() => {
    vi.clearAllMocks();
    store = new PostgresUsageStore();
  });

  it('sums usage for the exact period bounds', async () => {
    mockSql.mockResolvedValueOnce([{ used: 7 }]);

    await expect(
      store.sumUsage({ accountId: ACCOUNT, usageType: 'exports', period: PERIOD })
    ).resolves.toBe(7);

    const values = mockSql.mock.calls[0].slice(1);
    expect(values).toEqual([ACCOUNT, 'exports', PERIOD.start, PERIOD.end]);
  });

  it('locks, sums and inserts inside one transaction when under the limit', async () => {
    mockTx
      .mockResolvedValueOnce([]) // advisory lock
      .mockResolvedValueOnce([{ used: 4 }]) // sum
      .mockResolvedValueOnce([]); // insert

    await expect(store.appendIfWithinLimit(input(5))).resolves.toEqual({ appended: true, used: 5 });

    expect(mockSql.begin).toHaveBeenCalledTimes(1);
    expect(mockTx).toHaveBeenCalledTimes(3);
    expect(queryText(mockTx.mock.calls[0])).toContain('pg_advisory_xact_lock');
    expect(mockTx.mock.calls[0][1]).toBe(`${ACCOUNT}:exports`.length);
    expect(queryText(mockTx.mock.calls[2])).toContain('INSERT INTO usage_records');
  });

  it('does not insert when the cost would cross the limit', async () => {
    mockTx
      .mockResolvedValueOnce([])
      .mockResolvedValueOnce([{ used: 5 }]);

    await expect(store.appendIfWithinLimit(input(5))).resolves.toEqual({ appended: false, used: 5 });
    expect(mockTx).toHaveBeenCalledTimes(2);
  });

  it('skips the advisory lock for unlimited usage', async () => {
    mockTx
      .mockResolvedValueOnce([{ used: 900 }])
      .mockResolvedValueOnce([]);

    await expect(store.appendIfWithinLimit(input(-1, 2))).resolves.toEqual({ appended: true, used: 902 });
    expect(queryText(mockTx.mock.calls[0])).not.toContain('pg_advisory_xact_lock');
  });
});
