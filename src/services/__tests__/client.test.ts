import { describe, it, expect, vi } from 'vitest';

import { MemoryStorage, STORAGE_KEYS } from '../../lib/auth-token';
import { FakePushDelivery, FakeTransport, userPayload } from '../../test/fakes';
import { createCivicClient } from '../client';
import { DEFAULT_CONFIG } from '../config';

describe('createCivicClient', () => {
  it('restores the session and language on start', async () => {
    const storage = new MemoryStorage();
    await storage.write(STORAGE_KEYS.ACCESS_TOKEN, 'stored-token');
    await storage.write(STORAGE_KEYS.LANGUAGE, 'hi');
    const transport = new FakeTransport().reply('GET', '/users/me', userPayload());
    const client = createCivicClient({ config: DEFAULT_CONFIG, transport, storage, push: new FakePushDelivery() });

    await client.start();

    expect(client.session.getState().token).toBe('stored-token');
    expect(client.preferences.language).toBe('hi');
  });

  it('shares one session across containers', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const transport = new FakeTransport()
      .reply('POST', '/auth/login', { access_token: 'test-token' })
      .reply('GET', '/users/me', userPayload())
      .fail('GET', '/users/issues', 401, 'Could not validate credentials');
    const client = createCivicClient({ config: DEFAULT_CONFIG, transport, storage: new MemoryStorage() });
    await client.session.login('asha@example.com', 'test-secret');

    await client.issues.loadUserIssues();

    expect(client.session.getState().token).toBeNull();
    expect(client.issues.myIssues.getState().error?.category).toBe('AuthenticationRequired');
  });

  it('sizes the notification buffer from config', () => {
    const client = createCivicClient({
      config: { ...DEFAULT_CONFIG, notificationCapacity: 1 },
      transport: new FakeTransport(),
      storage: new MemoryStorage(),
    });
    vi.spyOn(console, 'debug').mockImplementation(() => {});

    client.notifications.ingestMessage({ title: 'a' });
    client.notifications.ingestMessage({ title: 'b' });

    expect(client.notifications.size()).toBe(1);
  });
});
