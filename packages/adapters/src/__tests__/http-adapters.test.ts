/**
 * Geocoding and notification adapters against undici's in-process MockAgent.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';
import { NominatimGeocodingAdapter } from '../geocoding/nominatim-geocoding.adapter.js';
import { WebhookNotificationDispatcher } from '../notifications/webhook-notification.adapter.js';

describe('NominatimGeocodingAdapter', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const geocoder = () => new NominatimGeocodingAdapter({ baseUrl: 'http://geo.test/', dispatcher: agent });

  it('returns the first match as a coordinate', async () => {
    agent
      .get('http://geo.test')
      .intercept({ path: (p: string) => p.startsWith('/search?'), method: 'GET' })
      .reply(200, [
        { lat: '51.5034', lon: '-0.1276' },
        { lat: '0', lon: '0' },
      ]);
    await expect(geocoder().resolveAddress('10 Downing Street')).resolves.toEqual({
      latitude: 51.5034,
      longitude: -0.1276,
    });
  });

  it('returns null when nothing matches', async () => {
    agent
      .get('http://geo.test')
      .intercept({ path: (p: string) => p.startsWith('/search?'), method: 'GET' })
      .reply(200, []);
    await expect(geocoder().resolveAddress('nowhere at all')).resolves.toBeNull();
  });

  it('returns null for a blank address without calling out', async () => {
    await expect(geocoder().resolveAddress('   ')).resolves.toBeNull();
  });

  it('throws on an error status', async () => {
    agent
      .get('http://geo.test')
      .intercept({ path: (p: string) => p.startsWith('/search?'), method: 'GET' })
      .reply(503, 'unavailable');
    await expect(geocoder().resolveAddress('1 Test Street')).rejects.toThrow('geocoder responded 503');
  });
});

describe('WebhookNotificationDispatcher', () => {
  it('posts the request as JSON', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    let received: unknown = null;
    agent
      .get('http://push.test')
      .intercept({ path: '/notify', method: 'POST' })
      .reply(202, (opts) => {
        received = typeof opts.body === 'string' ? JSON.parse(opts.body) : null;
        return { ok: true };
      });

    const dispatcher = new WebhookNotificationDispatcher('http://push.test/notify', agent);
    await dispatcher.dispatch({
      userId: 'client-1',
      title: 'Visit started',
      body: 'Your provider has arrived.',
      metadata: { type: 'visit_started', visitId: 'v-1' },
    });
    expect(received).toEqual({
      userId: 'client-1',
      title: 'Visit started',
      body: 'Your provider has arrived.',
      metadata: { type: 'visit_started', visitId: 'v-1' },
    });
    await agent.close();
  });

  it('rejects on a non-2xx response', async () => {
    const agent = new MockAgent();
    agent.disableNetConnect();
    agent.get('http://push.test').intercept({ path: '/notify', method: 'POST' }).reply(500, 'boom');
    const dispatcher = new WebhookNotificationDispatcher('http://push.test/notify', agent);
    await expect(
      dispatcher.dispatch({ userId: 'u', title: 't', body: 'b', metadata: { type: 'visit_completed' } }),
    ).rejects.toThrow('notification webhook responded 500');
    await agent.close();
  });
});
