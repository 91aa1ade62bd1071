import { encoding_for_model, get_encoding } from '@dqbd/tiktoken';
import type { TiktokenEncoding, TiktokenModel } from '@dqbd/tiktoken';
import { createComponentLogger } from '../utils/logger.js';

type Encoding = ReturnType<typeof get_encoding>;

const log = createComponentLogger('context-budget');
const cache = new Map<string, Encoding>();
const FALLBACK_ENCODING: TiktokenEncoding = 'o200k_base';

const KNOWN_MODEL_PATTERN = /^(gpt-|text-|code-|davinci|curie|babbage|ada)/;

function isTiktokenModel(model: string): model is TiktokenModel {
  return KNOWN_MODEL_PATTERN.test(model);
}

function fallbackEncoding(): Encoding {
  const existing = cache.get(FALLBACK_ENCODING);
  if (existing) {
    return existing;
  }
  const encoding = get_encoding(FALLBACK_ENCODING);
  cache.set(FALLBACK_ENCODING, encoding);
  return encoding;
}

function getEncoding(model: string): Encoding {
  const cached = cache.get(model);
  if (cached) {
    return cached;
  }

  let encoding: Encoding;
  try {
    encoding = isTiktokenModel(model) ? encoding_for_model(model) : fallbackEncoding();
  } catch (error) {
    log.warn({ model, err: error }, `unknown model, falling back to ${FALLBACK_ENCODING} encoding`);
    encoding = fallbackEncoding();
  }
  cache.set(model, encoding);
  return encoding;
}

export function estimateTokens(model: string, text: string): number {
  return getEncoding(model).encode(text ?? '').length;
}

/**
 * Renders as many leading items as fit in `maxTokens`. `render` receives the
 * kept items and how many were dropped, so it can note the omission.
 */
export function fitItemsToBudget<T>(
  model: string,
  items: T[],
  maxTokens: number,
  render: (kept: T[], omitted: number) => string
): { content: string; omitted: number } {
  const full = render(items, 0);
  if (estimateTokens(model, full) <= maxTokens) {
    return { content: full, omitted: 0 };
  }

  let low = 0;
  let high = items.length - 1;
  let best = render([], items.length);
  let bestOmitted = items.length;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const candidate = render(items.slice(0, mid), items.length - mid);
    if (estimateTokens(model, candidate) <= maxTokens) {
      best = candidate;
      bestOmitted = items.length - mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return { content: best, omitted: bestOmitted };
}
