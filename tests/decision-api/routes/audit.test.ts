import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SCENARIO_INPUT } from '../../decision-core/fixtures';
import { call, startTestApi, type TestApi } from '../harness';

describe('audit routes', () => {
  let api: TestApi;

  beforeEach(async () => {
    api = await startTestApi();
    await call(api, 'POST', '/claims', SCENARIO_INPUT);
  });

  afterEach(async () => {
    await api.close();
  });

  it('lists every record in global order', async () => {
    const res = await call(api, 'GET', '/audit');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      success: true,
      data: [
        { sequenceNumber: 1, claimId: 'claim-1', stage: 'RECEIVED' },
        { sequenceNumber: 2, stage: 'VALIDATED' },
        { sequenceNumber: 3, stage: 'GOVERNED' },
        { sequenceNumber: 4, stage: 'ADVISED' },
      ],
    });
  });

  it('starts from a given sequence number', async () => {
    const res = await call(api, 'GET', '/audit?from=3');
    expect(res.body).toMatchObject({
      data: [{ sequenceNumber: 3 }, { sequenceNumber: 4 }],
    });
  });

  it.each(['0', '-2', 'abc', '1.5'])('rejects from=%s', async (from) => {
    const res = await call(api, 'GET', `/audit?from=${from}`);
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      error: 'from must be a positive integer sequence number',
    });
  });

  it('verifies the hash chain', async () => {
    const res = await call(api, 'GET', '/audit/verify');
    expect(res.body).toEqual({ success: true, data: { valid: true, records: 4 } });
  });
});
