import { AuthenticationError } from '@pve-forge/shared';
import { describe, expect, it, vi } from 'vitest';
import { authenticate } from './connect.js';
import { MemoryCredentialStore } from './credentials/store.js';
import { createMockPrompter } from './testing/fakes.js';
import { captureLogger } from './testing/logger.js';

const ENDPOINT = 'https://pve01.lab:8006';

function ticketResponse(): Response {
  return new Response(JSON.stringify({ data: { ticket: 'PVE:root@pam:T', CSRFPreventionToken: 'c' } }), {
    status: 200,
  });
}

describe('authenticate', () => {
  it('uses a configured API token without logging in', async () => {
    const fetchFn = vi.fn();
    const auth = await authenticate(
      { server: 'pve01.lab', endpoint: ENDPOINT, cache: true, token: { id: 'forge@pve!ci', secret: 'test-secret' } },
      { credentials: new MemoryCredentialStore(), prompter: createMockPrompter(), logger: captureLogger().logger, fetchFn },
    );

    expect(auth).toEqual({ kind: 'token', tokenId: 'forge@pve!ci', tokenSecret: 'test-secret' });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('prompts for the password, logs in as root@pam and caches it', async () => {
    const fetchFn = vi.fn().mockResolvedValue(ticketResponse());
    const credentials = new MemoryCredentialStore();
    const prompter = createMockPrompter({ secret: 'test-password' });

    const auth = await authenticate(
      { server: 'pve01.lab', endpoint: ENDPOINT, cache: true },
      { credentials, prompter, logger: captureLogger().logger, fetchFn },
    );

    expect(auth).toEqual({ kind: 'ticket', ticket: 'PVE:root@pam:T', csrfToken: 'c' });
    expect(prompter.secret).toHaveBeenCalledWith('Please enter Proxmox password for pve01.lab:');
    expect(fetchFn.mock.calls[0]?.[1]).toMatchObject({
      body: 'username=root%40pam&password=test-password',
    });
    expect(await credentials.lookup('pve01.lab')).toEqual({ password: 'test-password' });
  });

  it('uses the cached username and password', async () => {
    const fetchFn = vi.fn().mockResolvedValue(ticketResponse());
    const credentials = new MemoryCredentialStore({
      'pve01.lab': { username: 'ops@pve', password: 'test-password' },
    });
    const prompter = createMockPrompter();

    await authenticate(
      { server: 'pve01.lab', endpoint: ENDPOINT, cache: true },
      { credentials, prompter, logger: captureLogger().logger, fetchFn },
    );

    expect(prompter.secret).not.toHaveBeenCalled();
    expect(fetchFn.mock.calls[0]?.[1]).toMatchObject({
      body: 'username=ops%40pve&password=test-password',
    });
  });

  it('drops cached credentials when the login is rejected', async () => {
    const fetchFn = vi.fn().mockResolvedValue(new Response('{}', { status: 401 }));
    const credentials = new MemoryCredentialStore({ 'pve01.lab': { password: 'stale' } });

    await expect(
      authenticate(
        { server: 'pve01.lab', endpoint: ENDPOINT, cache: true },
        { credentials, prompter: createMockPrompter(), logger: captureLogger().logger, fetchFn },
      ),
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(await credentials.lookup('pve01.lab')).toBeUndefined();
  });
});
