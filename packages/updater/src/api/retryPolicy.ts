export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export function parseRetryAfterMs(
  retryAfterHeader: string | null,
  nowMs: number
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();

  if (trimmed.length === 0) {
    return null;
  }

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const retryDateMs = Date.parse(trimmed);
  if (Number.isNaN(retryDateMs)) {
    return null;
  }

  return Math.max(0, retryDateMs - nowMs);
}

export function isRetriableStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

const PARTS_COUNT_PATTERN = /parts_count|too (large|big)/i;

/** A 400 asking for a finer split of the requested period. */
export function isPartsCountRejection(statusCode: number, body: string): boolean {
  return statusCode === 400 && PARTS_COUNT_PATTERN.test(body);
}

export function computeBackoffMs(
  attempt: number,
  policy: RetryPolicy,
  randomFn: () => number
): number {
  const base = Math.max(1, policy.baseDelayMs);
  const max = Math.max(base, policy.maxDelayMs);
  const exponential = Math.min(max, base * 2 ** Math.max(0, attempt - 1));
  const jitterWindow = Math.floor(exponential * 0.2);
  const jitter = Math.floor(randomFn() * (jitterWindow + 1));

  return Math.min(max, exponential + jitter);
}
