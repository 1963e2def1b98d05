import { AuthenticationError, type FetchFn, RemoteOperationError } from '@pve-forge/shared';
import { z } from 'zod';

export type ProxmoxAuth =
  | { kind: 'ticket'; ticket: string; csrfToken: string }
  | { kind: 'token'; tokenId: string; tokenSecret: string };

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

const TicketResponse = z.object({
  data: z.object({
    ticket: z.string(),
    CSRFPreventionToken: z.string(),
    username: z.string().optional(),
  }),
});

/** Build auth headers; ticket sessions need the CSRF token on writes */
export function buildAuthHeaders(auth: ProxmoxAuth, method: HttpMethod): Record<string, string> {
  if (auth.kind === 'token') {
    return { Authorization: `PVEAPIToken=${auth.tokenId}=${auth.tokenSecret}` };
  }
  const headers: Record<string, string> = { Cookie: `PVEAuthCookie=${auth.ticket}` };
  if (method !== 'GET') {
    headers.CSRFPreventionToken = auth.csrfToken;
  }
  return headers;
}

/**
 * Exchange username/password for an API ticket.
 * Rejected credentials raise AuthenticationError so callers can drop cached passwords.
 */
export async function login(
  endpoint: string,
  username: string,
  password: string,
  fetchFn: FetchFn,
): Promise<ProxmoxAuth> {
  const url = `${endpoint.replace(/\/$/, '')}/api2/json/access/ticket`;
  const res = await fetchFn(url, {
    method: 'POST',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: new URLSearchParams({ username, password }).toString(),
  });

  if (res.status === 401) {
    throw new AuthenticationError('Proxmox login credentials are not correct');
  }
  if (!res.ok) {
    throw new RemoteOperationError(`Proxmox API returned ${res.status}: ${res.statusText}`, {
      status: res.status,
    });
  }

  const body = TicketResponse.safeParse(await res.json());
  if (!body.success) {
    throw new AuthenticationError('Proxmox login credentials are not correct');
  }
  return { kind: 'ticket', ticket: body.data.data.ticket, csrfToken: body.data.data.CSRFPreventionToken };
}
