import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { call, startTestApi, type TestApi } from '../harness';

describe('policy pack route', () => {
  let api: TestApi;

  beforeAll(async () => {
    api = await startTestApi();
  });

  afterAll(async () => {
    await api.close();
  });

  it('publishes the loaded pack and its boundary rule ids', async () => {
    const res = await call(api, 'GET', '/policy-pack');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      success: true,
      data: {
        meta: { packId: 'claims-advisory-v1', version: '1.0.0' },
        capabilities: { dictionaryId: 'claims-capabilities' },
        boundaries: { specId: 'claims-severity-boundaries' },
        ruleIds: ['BND-INJ-001', 'BND-DMG-001', 'BND-LIA-001', 'BND-LOW-001', 'BND-HLT-001'],
      },
    });
  });
});
