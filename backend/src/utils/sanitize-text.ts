const SCRIPT_TAG_REGEX = /<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi;
const HTML_TAG_REGEX = /<[^>]*>/g;
const CODE_BLOCK_REGEX = /<\/?(code|pre)>/gi;

export type RedactionCategory =
  | 'private_key'
  | 'jwt'
  | 'bearer_token'
  | 'aws_key'
  | 'url_password'
  | 'secret'
  | 'email'
  | 'ipv6'
  | 'ipv4'
  | 'card'
  | 'ssn'
  | 'phone';

export interface RedactionRule {
  category: RedactionCategory;
  pattern: RegExp;
  replacement: string;
}

const IPV4_OCTET = '(?:25[0-5]|2[0-4]\\d|1?\\d?\\d)';
const HEX_GROUP = '[0-9a-fA-F]{1,4}';

// Placeholders use only letters, underscores and brackets, which no rule matches.
// Order matters: broad digit rules run after the structured ones.
export const REDACTION_RULES: readonly RedactionRule[] = [
  {
    category: 'private_key',
    pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
    replacement: '[REDACTED_PRIVATE_KEY]'
  },
  {
    category: 'jwt',
    pattern: /\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g,
    replacement: '[REDACTED_JWT]'
  },
  {
    category: 'bearer_token',
    pattern: /\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
    replacement: 'Bearer [REDACTED_TOKEN]'
  },
  {
    category: 'aws_key',
    pattern: /\b(?:AKIA|ASIA)[A-Z0-9]{16}\b/g,
    replacement: '[REDACTED_AWS_KEY]'
  },
  {
    category: 'url_password',
    pattern: /(\b[a-z][a-z0-9+.-]*:\/\/[^\s:@/]+):([^\s@/[]+)@/gi,
    replacement: '$1:[REDACTED_PASSWORD]@'
  },
  {
    category: 'secret',
    pattern:
      /\b(password|passwd|pwd|secret|client[_-]?secret|api[_-]?key|access[_-]?token|auth[_-]?token|private[_-]?key)(["']?\s*[:=]\s*["']?)([^\s"',;&[]+)/gi,
    replacement: '$1$2[REDACTED_SECRET]'
  },
  {
    category: 'email',
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
    replacement: '[REDACTED_EMAIL]'
  },
  {
    category: 'ipv6',
    pattern: new RegExp(
      `\\b(?:(?:${HEX_GROUP}:){7}${HEX_GROUP}|(?:${HEX_GROUP}:){1,6}:(?:${HEX_GROUP}:){0,5}${HEX_GROUP})\\b`,
      'g'
    ),
    replacement: '[REDACTED_IPV6]'
  },
  {
    category: 'ipv4',
    pattern: new RegExp(`\\b(?:${IPV4_OCTET}\\.){3}${IPV4_OCTET}\\b`, 'g'),
    replacement: '[REDACTED_IP]'
  },
  {
    category: 'card',
    pattern: /\b\d{4}[ -]?\d{4}[ -]?\d{4}[ -]?\d{4}\b/g,
    replacement: '[REDACTED_CARD]'
  },
  {
    category: 'ssn',
    pattern: /\b\d{3}-\d{2}-\d{4}\b/g,
    replacement: '[REDACTED_SSN]'
  },
  {
    category: 'phone',
    pattern: /(?:\(\d{3}\)\s?|\b\d{3}[-.])\d{3}[-.]\d{4}\b/g,
    replacement: '[REDACTED_PHONE]'
  }
];

export interface RedactionReport {
  text: string;
  counts: Partial<Record<RedactionCategory, number>>;
  total: number;
}

export interface Redactor {
  sanitize(text: string): string;
  sanitizeWithReport(text: string): RedactionReport;
}

export function redactWithReport(content: string, rules: readonly RedactionRule[] = REDACTION_RULES): RedactionReport {
  const counts: Partial<Record<RedactionCategory, number>> = {};
  let total = 0;
  if (!content) {
    return { text: '', counts, total };
  }
  const text = rules.reduce((accumulator, { category, pattern, replacement }) => {
    let matched = 0;
    const next = accumulator.replace(pattern, (...args: unknown[]) => {
      matched += 1;
      return expandReplacement(replacement, args);
    });
    if (matched > 0) {
      counts[category] = (counts[category] ?? 0) + matched;
      total += matched;
    }
    return next;
  }, content);
  return { text, counts, total };
}

function expandReplacement(replacement: string, args: unknown[]): string {
  return replacement.replace(/\$(\d)/g, (_, index: string) => {
    const group = args[Number(index)];
    return typeof group === 'string' ? group : '';
  });
}

export function redactSensitiveText(content: string): string {
  return redactWithReport(content).text;
}

export function createRedactor(options: { enabled?: boolean; rules?: readonly RedactionRule[] } = {}): Redactor {
  const { enabled = true, rules = REDACTION_RULES } = options;
  if (!enabled) {
    return {
      sanitize: (text) => text,
      sanitizeWithReport: (text) => ({ text, counts: {}, total: 0 })
    };
  }
  return {
    sanitize: (text) => redactWithReport(text, rules).text,
    sanitizeWithReport: (text) => redactWithReport(text, rules)
  };
}

function stripHtml(content: string): string {
  let sanitized = content.replace(SCRIPT_TAG_REGEX, '');
  sanitized = sanitized.replace(CODE_BLOCK_REGEX, '`');
  sanitized = sanitized.replace(HTML_TAG_REGEX, '');
  return sanitized;
}

function normalizeWhitespace(content: string): string {
  let normalized = content.replace(/\r\n?/g, '\n');
  normalized = normalized.replace(/\u00a0/g, ' ');
  const lines = normalized.split('\n').map((line) => line.replace(/\s+$/g, ''));
  normalized = lines.join('\n');
  normalized = normalized.replace(/\n{3,}/g, '\n\n');
  return normalized.trim();
}

/** Cleans a user utterance before it enters conversation history. */
export function sanitizeUserContent(content: string): string {
  if (!content) {
    return '';
  }
  return normalizeWhitespace(stripHtml(content));
}
