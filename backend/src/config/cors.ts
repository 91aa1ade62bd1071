function normalizeOrigin(origin: string) {
  const trimmed = origin.trim();
  if (!trimmed) {
    return '';
  }

  try {
    const url = new URL(trimmed);
    const port = url.port ? `:${url.port}` : '';
    return `${url.protocol.toLowerCase()}//${url.hostname.toLowerCase()}${port}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

function expandOriginVariants(origin: string) {
  try {
    const url = new URL(origin);
    const variants = new Set<string>([url.origin]);
    if (url.hostname === 'localhost') {
      const port = url.port ? `:${url.port}` : '';
      variants.add(`${url.protocol}//127.0.0.1${port}`);
      variants.add(`${url.protocol}//[::1]${port}`);
    }
    return Array.from(variants);
  } catch {
    return [origin];
  }
}

function isLoopbackOrigin(origin: string) {
  try {
    const url = new URL(origin);
    return ['localhost', '127.0.0.1', '[::1]'].includes(url.hostname.toLowerCase()) && /^https?:$/.test(url.protocol);
  } catch {
    return false;
  }
}

export interface OriginPolicy {
  allowedOrigins: string[];
  isAllowed(origin?: string | null): boolean;
}

/**
 * Builds the CORS check from a comma-separated origin list. Requests without
 * an Origin header are allowed; loopback origins are allowed when
 * `allowLoopback` is set.
 */
export function createOriginPolicy(corsOrigin: string, allowLoopback: boolean): OriginPolicy {
  const allowed = new Set(
    corsOrigin
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean)
      .flatMap(expandOriginVariants)
      .map(normalizeOrigin)
      .filter(Boolean)
  );

  return {
    allowedOrigins: Array.from(allowed),
    isAllowed(origin) {
      if (!origin) {
        return true;
      }
      if (allowed.has(normalizeOrigin(origin))) {
        return true;
      }
      return allowLoopback && isLoopbackOrigin(origin);
    }
  };
}
