import { ConfigurationError } from '@pve-forge/shared';
import { describe, expect, it, vi } from 'vitest';
import { encodeSshKeys, withEncodedSshKeys } from './ssh-keys.js';

const KEY = 'ssh-ed25519 AAAATEST ops@lab';

describe('encodeSshKeys', () => {
  it('encodes literal keys', async () => {
    expect(await encodeSshKeys(KEY)).toBe('ssh-ed25519%20AAAATEST%20ops%40lab');
  });

  it('reads keys from an absolute path', async () => {
    const readFile = vi.fn().mockResolvedValue(`${KEY}\n`);
    expect(await encodeSshKeys('/root/.ssh/authorized_keys', { readFile })).toBe(
      'ssh-ed25519%20AAAATEST%20ops%40lab',
    );
    expect(readFile).toHaveBeenCalledWith('/root/.ssh/authorized_keys');
  });

  it('keeps newlines between several keys', async () => {
    const readFile = vi.fn().mockResolvedValue('ssh-rsa A a\nssh-rsa B b\n');
    expect(await encodeSshKeys('/keys', { readFile })).toBe('ssh-rsa%20A%20a%0Assh-rsa%20B%20b');
  });

  it('reports a missing key file', async () => {
    const readFile = vi.fn().mockRejectedValue(Object.assign(new Error('nope'), { code: 'ENOENT' }));
    await expect(encodeSshKeys('/missing', { readFile })).rejects.toThrow(
      'Could not find sshkeys file: /missing',
    );
  });

  it('rejects an empty key file', async () => {
    const readFile = vi.fn().mockResolvedValue('\n');
    await expect(encodeSshKeys('/empty', { readFile })).rejects.toThrow(
      'There is no key in file: /empty',
    );
  });

  it('fetches keys from a URL', async () => {
    const fetchFn = vi.fn().mockResolvedValue(new Response(KEY));
    expect(await encodeSshKeys('https://keys.lab/ops.keys', { fetchFn })).toBe(
      'ssh-ed25519%20AAAATEST%20ops%40lab',
    );
    expect(fetchFn).toHaveBeenCalledWith('https://keys.lab/ops.keys');
  });

  it('fails when the URL cannot be loaded', async () => {
    const fetchFn = vi.fn().mockResolvedValue(new Response('not found', { status: 404 }));
    await expect(encodeSshKeys('https://keys.lab/ops.keys', { fetchFn })).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });
});

describe('withEncodedSshKeys', () => {
  it('returns options without sshkeys unchanged', async () => {
    const options = { cores: 2, scsi0: 'thin-a:8' };
    expect(await withEncodedSshKeys(options)).toBe(options);
  });

  it('replaces sshkeys with the encoded value without mutating the input', async () => {
    const options = { scsi0: 'thin-a:8', sshkeys: KEY };
    expect(await withEncodedSshKeys(options)).toEqual({
      scsi0: 'thin-a:8',
      sshkeys: 'ssh-ed25519%20AAAATEST%20ops%40lab',
    });
    expect(options.sshkeys).toBe(KEY);
  });
});
