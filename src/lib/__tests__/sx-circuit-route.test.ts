import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { GET, POST } from '@/app/api/sx-circuit/route';

const feed = {
  plsStreams: [{ copper: 2.0, flow: 100 }],
  stripLiquor: { copper: 35 },
};

const post = (body: unknown) =>
  POST(
    new Request('http://localhost/api/sx-circuit', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    })
  );

describe('/api/sx-circuit', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists the scenario catalog', async () => {
    const response = await GET();
    expect(response.status).toBe(200);
    const body = await response.json();
    expect(body.scenarios).toHaveLength(18);
    expect(body.scenarios[8]).toEqual(expect.objectContaining({ id: 'I', crossPhaseRecycle: true }));
    expect(body.scenarios[4]).toEqual(
      expect.objectContaining({ id: 'E', stages: '3E × 1S', extractionStages: 3, strippingStages: 1, crossPhaseRecycle: false })
    );
  });

  it('runs plant mode', async () => {
    const response = await post({ scenario: 'C', mode: 'plant', feed: { ...feed, extractantVv: 20 } });
    expect(response.status).toBe(200);
    const body = await response.json();

    expect(body.mode).toBe('plant');
    expect(body.scenario).toBe('C');
    expect(body.results[0]).toEqual({ label: 'Extractant concentration', value: '20.00', unit: '% v/v' });
    expect(body.results[7]).toEqual({ label: 'Stripping ratio', value: '82.75', unit: '%' });
    expect(body.profile.converged).toBe(true);
    expect(body.profile.extraction).toHaveLength(3);
    expect(body.chartData.diagram.stagePoints).toHaveLength(3);
    expect(body.chartData.extraction.series).toHaveLength(4);
    expect(body.chartData.stripping.series).toHaveLength(4);
    expect(body.recommendations).toHaveLength(2);
  });

  it('runs optimize mode', async () => {
    const response = await post({ scenario: 'C', mode: 'optimize', feed, target: 50 });
    expect(response.status).toBe(200);
    const body = await response.json();

    expect(body.mode).toBe('optimize');
    expect(Math.abs(body.profile.strippingRatio - 50)).toBeLessThanOrEqual(0.1);
    expect(body.profile.search.converged).toBe(true);
  });

  it('maps an unknown scenario to 404', async () => {
    const response = await post({ scenario: 'Z', mode: 'plant', feed: { ...feed, extractantVv: 20 } });
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Scenario "Z" is not registered.', kind: 'unknown-scenario' });
  });

  it('maps invalid input to 400', async () => {
    const response = await post({ scenario: 'C', mode: 'plant', feed: { ...feed, extractantVv: 0 } });
    expect(response.status).toBe(400);
    const body = await response.json();
    expect(body.kind).toBe('invalid-input');
    expect(body.error).toBe('extractantVv: must be greater than zero, got 0.');
  });

  it('maps an unreachable target to 422', async () => {
    const response = await post({ scenario: 'C', mode: 'optimize', feed, target: 99 });
    expect(response.status).toBe(422);
    expect((await response.json()).kind).toBe('unreachable-target');
  });

  it('rejects a body that is not JSON', async () => {
    const response = await post('{not json');
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Request body must be valid JSON', kind: 'invalid-input' });
  });
});
