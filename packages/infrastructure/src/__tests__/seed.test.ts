import { describe, expect, it, vi } from 'vitest';

import { DEV_WIDGET_TOKEN, seedDevelopmentData } from '../database/seed.js';

describe('seedDevelopmentData', () => {
  it('should upsert the inbox and create only missing agents', async () => {
    const db = {
      query: vi
        .fn()
        .mockResolvedValueOnce({ rows: [{ id: 1 }], rowCount: 1 }) // inbox
        .mockResolvedValueOnce({ rows: [{ id: 11 }], rowCount: 1 }) // Agent One exists
        .mockResolvedValueOnce({ rows: [], rowCount: 0 }) // Agent Two missing
        .mockResolvedValueOnce({ rows: [{ id: 12 }], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [], rowCount: 0 }) // Agent Three missing
        .mockResolvedValueOnce({ rows: [{ id: 13 }], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [{ id: 14 }], rowCount: 1 }), // admin exists
    };
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

    const report = await seedDevelopmentData(db, logger);

    expect(report).toEqual({ inboxId: 1, agentIds: [11, 12, 13, 14] });
    expect(db.query).toHaveBeenCalledTimes(7);
    expect(db.query.mock.calls[0]?.[1]).toEqual([
      'Website chat',
      1,
      DEV_WIDGET_TOKEN,
      { security: { allowed_domains: [] } },
    ]);
    expect(db.query.mock.calls[5]?.[1]).toEqual(['Agent Three', 1, 'agent', 'self']);
    expect(logger.info).toHaveBeenCalledWith(
      { inboxId: 1, agentCount: 4 },
      'Development data seeded'
    );
  });
});
