export { ProxmoxClient, type ProxmoxClientConfig, encodeForm, proxmoxUrl } from './client.js';
export { type HttpMethod, type ProxmoxAuth, buildAuthHeaders, login } from './auth.js';
export { buildTlsFetch } from './tls-fetch.js';
