export interface ScrubPattern {
  name: string;
  pattern: RegExp;
  replacement?: string;
}

/** Key names that indicate sensitive values (case-insensitive match) */
const SENSITIVE_KEY_RE = /(?:SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE)/i;

export const DEFAULT_SCRUB_PATTERNS: ScrubPattern[] = [
  {
    name: 'url-credentials',
    pattern: /((?:https?|ftp):\/\/[^:/@\s']+:)(?:'\\''|[^@\s'])+(@)/gi,
    replacement: '$1[REDACTED]$2',
  },
  {
    name: 'env-var-secrets',
    pattern: /\b(\w*(?:SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE)\w*)\s*[=:]\s*\S+/gi,
    replacement: '$1=[REDACTED]',
  },
  {
    name: 'basic-auth',
    pattern: /(Basic\s+)[A-Za-z0-9+/=]+/g,
    replacement: '$1[REDACTED]',
  },
  {
    name: 'bearer-tokens',
    pattern: /(Bearer\s+)\S+/gi,
    replacement: '$1[REDACTED]',
  },
];

/**
 * Deep-walk data, applying scrub patterns to all string values.
 * Also redacts values of object keys that match sensitive key names.
 */
export function scrubData(data: unknown, patterns: ScrubPattern[] = DEFAULT_SCRUB_PATTERNS): unknown {
  if (data === null || data === undefined) return data;
  if (typeof data === 'boolean' || typeof data === 'number') return data;

  if (typeof data === 'string') {
    return scrubString(data, patterns);
  }

  if (Array.isArray(data)) {
    return data.map((item) => scrubData(item, patterns));
  }

  if (typeof data === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (typeof value === 'string') {
        result[key] = scrubField(key, value, patterns);
      } else {
        result[key] = scrubData(value, patterns);
      }
    }
    return result;
  }

  return data;
}

/** Scrub one named string value; sensitive names are redacted outright */
export function scrubField(key: string, value: string, patterns: ScrubPattern[] = DEFAULT_SCRUB_PATTERNS): string {
  return SENSITIVE_KEY_RE.test(key) ? '[REDACTED]' : scrubString(value, patterns);
}

export function scrubString(str: string, patterns: ScrubPattern[] = DEFAULT_SCRUB_PATTERNS): string {
  let result = str;
  for (const p of patterns) {
    // Reset lastIndex for global regexes
    p.pattern.lastIndex = 0;
    result = result.replace(p.pattern, p.replacement ?? '[REDACTED]');
  }
  return result;
}
