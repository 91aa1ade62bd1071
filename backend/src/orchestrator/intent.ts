export type IntentKind = 'search_logs' | 'list_groups' | 'expand_time' | 'change_filter' | 'analyze';

export interface IntentRule {
  kind: IntentKind;
  pattern: RegExp;
  confidence: number;
  /** Rules that describe work the model can do without a tool never trigger a nudge. */
  needsTool: boolean;
}

export interface IntentMatch {
  kind: IntentKind;
  confidence: number;
  trigger: string;
}

export const DEFAULT_INTENT_THRESHOLD = 0.8;

export const DEFAULT_INTENT_RULES: readonly IntentRule[] = [
  {
    kind: 'search_logs',
    pattern: /\b(?:i['’]?ll|let me|i will|i['’]?m going to)\s+(?:search|look|check|fetch|find|query|examine|investigate)\b/i,
    confidence: 0.9,
    needsTool: true
  },
  {
    kind: 'list_groups',
    pattern: /\b(?:i['’]?ll|let me|i will)\s+(?:list|show|display|get)\s+(?:the\s+)?(?:available\s+)?log\s*groups?\b/i,
    confidence: 0.9,
    needsTool: true
  },
  {
    kind: 'expand_time',
    pattern: /\b(?:expand|widen|broaden|increase|extend)\s+(?:the\s+)?time\s*(?:range|window|period)?\b/i,
    confidence: 0.8,
    needsTool: true
  },
  {
    kind: 'change_filter',
    pattern: /\b(?:try|use)\s+(?:a\s+)?(?:different|another|broader|narrower)\s+filter\b/i,
    confidence: 0.8,
    needsTool: true
  },
  {
    kind: 'analyze',
    pattern: /\b(?:i['’]?ll|let me)\s+(?:analyze|summarize|review)\s+(?:the\s+)?(?:results|logs|data)\b/i,
    confidence: 0.5,
    needsTool: false
  }
];

/**
 * Finds a first-person statement of an action that needs a tool, e.g.
 * "Let me check the logs". Rules are tried in order; the first qualifying
 * match wins.
 */
export function detectStatedIntent(
  text: string,
  rules: readonly IntentRule[] = DEFAULT_INTENT_RULES,
  threshold = DEFAULT_INTENT_THRESHOLD
): IntentMatch | undefined {
  if (!text.trim()) {
    return undefined;
  }
  for (const rule of rules) {
    if (!rule.needsTool || rule.confidence < threshold) {
      continue;
    }
    const match = rule.pattern.exec(text);
    if (match) {
      return { kind: rule.kind, confidence: rule.confidence, trigger: match[0] };
    }
  }
  return undefined;
}

export const DEFAULT_GIVING_UP_PATTERNS: readonly RegExp[] = [
  /\bno\s+(?:logs?|results?|data|entries)\s+(?:were\s+)?found\b/i,
  /\b(?:couldn['’]?t|could\s+not)\s+find\s+any\b/i,
  /\bthere\s+(?:are|were)\s+no\s+(?:matching\s+)?(?:logs?|results?)\b/i,
  /\bthe\s+search\s+returned\s+(?:no|zero|empty)\b/i,
  /\bunfortunately,?\s+(?:i\s+)?(?:couldn['’]?t|could\s+not|was\s+unable)\b/i
];

/** Returns the phrase with which a reply concludes that nothing exists, e.g. "no logs were found". */
export function detectPrematureGivingUp(
  text: string,
  patterns: readonly RegExp[] = DEFAULT_GIVING_UP_PATTERNS
): string | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (match) {
      return match[0];
    }
  }
  return undefined;
}
