/**
 * Redaction rules for chat logging
 *
 * Visitor-supplied content (message bodies, contact details) and every
 * credential-like token the gateway hands out are masked before a log line
 * leaves the process.
 *
 * Paths are enumerated explicitly; pino's redaction does not support
 * arbitrary-depth wildcards.
 */

/**
 * Paths to redact in log objects
 */
export const REDACTION_PATHS: string[] = [
  // Contact PII
  'email',
  'phone',
  'name',
  'contact.email',
  'contact.phone',
  'contact.name',

  // Message content
  'body',
  'message.body',
  'messages[*].body',
  'payload.body',
  'payload.message.body',

  // Widget credentials
  'widgetToken',
  'widget_token',
  'sessionToken',
  'widget_session_token',
  'captchaToken',
  'captcha_token',
  'captchaAnswer',
  'captcha_answer',
  'session.token',

  // Network identifiers
  'clientIp',
  'ip',

  // Authentication/credentials
  'password',
  'token',
  'secret',
  'authorization',

  // Request/response bodies
  'req.headers.authorization',
  'req.headers.cookie',
  'req.body.body',
  'req.body.widget_token',
  'req.body.widget_session_token',
  'req.body.captcha_answer',
  'req.query.widget_token',
  'req.query.widget_session_token',
];

/**
 * Redaction censor: keeps the field name visible so redacted lines stay debuggable
 */
export function createCensor(_value: unknown, path: string[]): string {
  const fieldName = path[path.length - 1] ?? 'unknown';
  return `[REDACTED:${fieldName}]`;
}

/**
 * Patterns for PII embedded in free-form strings
 */
export const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  internationalPhone: /\+[1-9]\d{6,14}/g,
  ipv4Address: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g,
  bearerToken: /Bearer\s+[A-Za-z0-9._~+/-]+=*/g,
} as const;

/**
 * Redact PII patterns from a string value
 *
 * Tokens go first so their contents are not partially matched by the
 * narrower patterns.
 */
export function redactString(value: string): string {
  let result = value;

  result = result.replace(PII_PATTERNS.bearerToken, '[REDACTED:token]');
  result = result.replace(PII_PATTERNS.email, '[REDACTED:email]');
  result = result.replace(PII_PATTERNS.internationalPhone, '[REDACTED:phone]');
  result = result.replace(PII_PATTERNS.ipv4Address, '[REDACTED:ip]');

  return result;
}

/**
 * Mask an opaque token for safe logging, keeping a short prefix for correlation
 *
 * @example
 * maskToken('abcdefghijklmnop') // returns 'abcd…'
 */
export function maskToken(token: string | undefined | null): string {
  if (!token) return '[NO_TOKEN]';
  return `${token.slice(0, 4)}…`;
}

/**
 * Mask an email address for safe logging
 *
 * @example
 * maskEmail('visitor@example.com') // returns 'vi***@example.com'
 */
export function maskEmail(email: string | undefined | null): string {
  if (!email) return '[NO_EMAIL]';

  const atIndex = email.indexOf('@');
  if (atIndex < 1) return '[INVALID_EMAIL]';

  const localPart = email.slice(0, atIndex);
  const domain = email.slice(atIndex);

  const visibleChars = Math.min(2, localPart.length);
  return `${localPart.slice(0, visibleChars)}***${domain}`;
}
