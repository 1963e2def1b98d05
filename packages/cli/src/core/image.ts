import { randomUUID } from 'node:crypto';
import {
  type CredentialProvider,
  type FetchFn,
  ImageResolutionError,
  type Prompter,
  type RemoteExec,
} from '@pve-forge/shared';
import { isPlaceholder, placeholderLabel, resolveCredentials } from '../credentials/resolve.js';
import type { Logger } from '../logger.js';
import { shellQuote } from '../runtime/remote-exec.js';

export type ImageSpec =
  | {
      kind: 'remote';
      scheme: string;
      /** Host and path without credentials */
      location: string;
      host: string;
      credentials?: { username: string; password: string };
    }
  | { kind: 'local'; path: string };

export interface AcquiredImage {
  /** Image path on the target host */
  path: string;
  /** Reference safe to log and record; never carries a password */
  displayRef: string;
  /** Staging directory holding a downloaded image */
  stagingDir?: string;
  cleanup(): Promise<void>;
}

export interface ImageDeps {
  remote: RemoteExec;
  credentials: CredentialProvider;
  prompter: Prompter;
  logger: Logger;
  fetchFn: FetchFn;
  /** Persist prompted credentials */
  cacheCredentials: boolean;
  stagingRoot?: string;
  newId?: () => string;
}

export const STAGED_IMAGE_NAME = 'qcow2-image';

const REMOTE_RE = /^(https?):\/\/(.+)$/;

export function parseImageRef(ref: string): ImageSpec {
  const match = REMOTE_RE.exec(ref);
  if (!match?.[1] || !match[2]) return { kind: 'local', path: ref };

  const scheme = match[1];
  const rest = match[2];
  const at = rest.lastIndexOf('@');
  const location = at >= 0 ? rest.slice(at + 1) : rest;
  const host = location.split('/', 1)[0] ?? location;
  if (at < 0) return { kind: 'remote', scheme, location, host };

  const userInfo = rest.slice(0, at);
  const colon = userInfo.indexOf(':');
  if (colon < 0) {
    throw new ImageResolutionError('Password part is missing in image URL');
  }
  return {
    kind: 'remote',
    scheme,
    location,
    host,
    credentials: { username: userInfo.slice(0, colon), password: userInfo.slice(colon + 1) },
  };
}

export function displayRefOf(spec: ImageSpec): string {
  return spec.kind === 'remote' ? `${spec.scheme}://${spec.location}` : spec.path;
}

async function resolveImageCredentials(
  spec: Extract<ImageSpec, { kind: 'remote' }>,
  given: { username: string; password: string },
  deps: ImageDeps,
): Promise<{ username: string; password: string }> {
  const userPlaceholder = isPlaceholder(given.username);
  const passwordPlaceholder = isPlaceholder(given.password);
  if (!userPlaceholder && !passwordPlaceholder) return given;

  const resolved = await resolveCredentials(
    {
      host: spec.host,
      ...(userPlaceholder ? {} : { username: given.username }),
      ...(passwordPlaceholder ? {} : { password: given.password }),
      askUsername: true,
      usernameLabel: placeholderLabel(given.username),
      passwordLabel: placeholderLabel(given.password),
      cache: deps.cacheCredentials,
    },
    deps,
  );
  return { username: resolved.username ?? '', password: resolved.password };
}

async function checkReachable(
  spec: Extract<ImageSpec, { kind: 'remote' }>,
  credentials: { username: string; password: string },
  deps: ImageDeps,
): Promise<void> {
  const url = displayRefOf(spec);
  const token = Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64');

  let status: number | undefined;
  try {
    const res = await deps.fetchFn(url, {
      method: 'HEAD',
      headers: { Authorization: `Basic ${token}` },
      redirect: 'follow',
    });
    status = res.status;
  } catch (err: unknown) {
    deps.logger.debug({ url, err: err instanceof Error ? err.message : String(err) }, 'Image HEAD request failed');
  }

  if (status !== 200) {
    await deps.credentials.invalidate(spec.host);
    throw new ImageResolutionError('Image URL cannot be loaded. Please check URL/credentials!');
  }
}

/** Percent-encode a URL user info part, including !'()* */
export function encodeUserInfo(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

async function downloadImage(
  spec: Extract<ImageSpec, { kind: 'remote' }>,
  deps: ImageDeps,
): Promise<AcquiredImage> {
  const displayRef = displayRefOf(spec);
  let transferUrl = displayRef;

  if (spec.credentials) {
    const credentials = await resolveImageCredentials(spec, spec.credentials, deps);
    await checkReachable(spec, credentials, deps);
    const userInfo = `${encodeUserInfo(credentials.username)}:${encodeUserInfo(credentials.password)}`;
    transferUrl = `${spec.scheme}://${userInfo}@${spec.location}`;
  }

  const stagingDir = `${deps.stagingRoot ?? '/tmp'}/${(deps.newId ?? randomUUID)()}`;
  const path = `${stagingDir}/${STAGED_IMAGE_NAME}`;

  deps.logger.info({ dir: stagingDir }, 'Creating temp directory on the server');
  await deps.remote.run(`mkdir -p ${shellQuote(stagingDir)}`);
  deps.logger.info({ image: displayRef }, `Downloading image ${displayRef}`);
  await deps.remote.run(`curl -fsSLo ${shellQuote(path)} ${shellQuote(transferUrl)}`);

  return {
    path,
    displayRef,
    stagingDir,
    cleanup: async () => {
      deps.logger.info({ dir: stagingDir }, 'Removing downloaded image');
      await deps.remote.run(`rm -rf ${shellQuote(stagingDir)}`);
    },
  };
}

async function verifyLocalImage(path: string, deps: ImageDeps): Promise<AcquiredImage> {
  const listed = (await deps.remote.run(`ls ${shellQuote(path)} 2>/dev/null || true`)).trim();
  if (listed !== path) {
    throw new ImageResolutionError(`Image does not exist on the server: ${path}`);
  }
  return { path, displayRef: path, cleanup: async () => {} };
}

/**
 * Turn an image reference into a path on the target host.
 * Remote images are downloaded into a fresh staging directory.
 */
export async function acquireImage(ref: string, deps: ImageDeps): Promise<AcquiredImage> {
  const spec = parseImageRef(ref);
  return spec.kind === 'remote' ? downloadImage(spec, deps) : verifyLocalImage(spec.path, deps);
}
