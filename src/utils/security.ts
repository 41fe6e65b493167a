/**
 * Masking helpers for anything that may carry credentials before it is logged
 */

const SENSITIVE_PATTERNS = {
  // user:password@host in connection URIs (bolt, neo4j, http)
  uriCredentials: /(\w+:\/\/)([^:/@\s]+):([^@/\s]+)@/g,
  apiKey: /(?:api[_-]?key|apikey|access[_-]?token|secret[_-]?key)\s*[:=]\s*['"]?([a-zA-Z0-9_\-]{12,})['"]?/gi,
  bearer: /Bearer\s+[A-Za-z0-9._\-]+/g,
};

export function maskSensitiveData(text: string): string {
  if (!text) return text;

  return text
    .replace(SENSITIVE_PATTERNS.uriCredentials, (_match, scheme: string, user: string) => `${scheme}${user}:****@`)
    .replace(SENSITIVE_PATTERNS.apiKey, (match, value: string) => match.replace(value, '****'))
    .replace(SENSITIVE_PATTERNS.bearer, 'Bearer ****');
}

/**
 * Short preview of user text for log lines
 */
export function previewText(text: string, maxLength: number = 100): string {
  const masked = maskSensitiveData(text);
  return masked.length > maxLength ? `${masked.substring(0, maxLength)}...` : masked;
}
