/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';
import { AuthenticationGate } from './AuthenticationGate.js';
import { CredentialStore } from './CredentialStore.js';
import { AgentSession } from '../session/AgentSession.js';
import { StreamingChannel } from '../streaming/StreamingChannel.js';
import { drain, fakeProvider } from '../test-utils/fakes.js';
import type { TenantResolver } from './tenant-resolver.js';

function setup(
  behaviour: Parameters<typeof fakeProvider>[0],
  resolveTenant: TenantResolver = async () => 'cloud-1',
) {
  const store = new CredentialStore();
  const session = new AgentSession('s1', store);
  const channel = new StreamingChannel();
  const { provider, requestAccessToken } = fakeProvider(behaviour);
  const gate = new AuthenticationGate(
    { provider, resolveTenant, scopes: ['read:confluence-content.all'] },
    session,
    channel,
  );
  return { store, session, channel, gate, requestAccessToken };
}

describe('AuthenticationGate', () => {
  it('stores the credential and reports success', async () => {
    const { store, session, channel, gate, requestAccessToken } = setup(
      async (request) => {
        await request.onAuthUrl('https://auth.example.test/consent');
        return 'test-token';
      },
    );
    session.lastToolName = 'get_confluence_page';

    await expect(gate.handleAuthentication()).resolves.toBe(true);

    expect(await drain(channel)).toEqual([
      {
        type: 'status',
        level: 'info',
        message:
          'Authentication required for get_confluence_page access. Starting authorization flow...',
      },
      { type: 'auth_url', url: 'https://auth.example.test/consent' },
      {
        type: 'status',
        level: 'info',
        message: 'Authentication successful! Atlassian Cloud ID: cloud-1',
      },
      {
        type: 'status',
        level: 'info',
        message: 'Retrying get_confluence_page...',
      },
    ]);
    expect(store.get('s1')).toMatchObject({
      accessToken: 'test-token',
      tenantId: 'cloud-1',
      metadata: {},
    });
    expect(requestAccessToken).toHaveBeenCalledWith(
      expect.objectContaining({
        sessionId: 's1',
        scopes: ['read:confluence-content.all'],
        flow: 'USER_FEDERATION',
        forceAuthentication: false,
      }),
    );
  });

  it('fails without storing when no tenant is found', async () => {
    const { store, channel, gate } = setup(
      async () => 'test-token',
      async () => null,
    );

    await expect(gate.handleAuthentication()).resolves.toBe(false);

    expect(await drain(channel)).toEqual([
      {
        type: 'status',
        level: 'info',
        message:
          'Authentication required for Confluence access. Starting authorization flow...',
      },
      {
        type: 'status',
        level: 'error',
        message: 'Failed to obtain Atlassian Cloud ID',
      },
    ]);
    expect(store.get('s1')).toBeUndefined();
  });

  it('reports the provider error text', async () => {
    const { store, channel, gate } = setup(async () => {
      throw new Error('consent denied');
    });

    await expect(gate.handleAuthentication()).resolves.toBe(false);

    const events = await drain(channel);
    expect(events.at(-1)).toEqual({
      type: 'status',
      level: 'error',
      message: 'Authentication failed: consent denied',
    });
    expect(store.get('s1')).toBeUndefined();
  });

  it('reports a tenant lookup that throws', async () => {
    const resolveTenant = vi.fn<TenantResolver>(async () => {
      throw new Error('fetch failed');
    });
    const { channel, gate } = setup(async () => 'test-token', resolveTenant);

    await expect(gate.handleAuthentication()).resolves.toBe(false);

    expect(resolveTenant).toHaveBeenCalledWith('test-token');
    expect((await drain(channel)).at(-1)).toEqual({
      type: 'status',
      level: 'error',
      message: 'Authentication failed: fetch failed',
    });
  });

  it('sends the consent URL to every gate waiting on the session', async () => {
    let approve: () => void = () => {};
    const approval = new Promise<void>((resolve) => {
      approve = resolve;
    });
    const { session, channel, gate, requestAccessToken } = setup(
      async (request) => {
        await request.onAuthUrl('https://auth.example.test/consent');
        await approval;
        return 'test-token';
      },
    );
    const otherChannel = new StreamingChannel();
    const otherGate = new AuthenticationGate(
      {
        provider: { name: 'unused', requestAccessToken },
        resolveTenant: async () => 'cloud-1',
        scopes: ['read:confluence-content.all'],
      },
      session,
      otherChannel,
    );

    const first = gate.handleAuthentication();
    const second = otherGate.handleAuthentication();
    approve();

    await expect(Promise.all([first, second])).resolves.toEqual([true, true]);
    expect(requestAccessToken).toHaveBeenCalledTimes(1);
    for (const events of [await drain(channel), await drain(otherChannel)]) {
      expect(events).toContainEqual({
        type: 'auth_url',
        url: 'https://auth.example.test/consent',
      });
    }
  });
});
