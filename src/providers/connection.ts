const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const MAX_CAUSE_DEPTH = 5;

/**
 * True when the error (or anything in its cause chain) is a transport-level
 * failure: nothing listening, DNS miss, reset socket. undici reports these
 * as `TypeError: fetch failed` with the system error as `cause`.
 */
export function isConnectionError(error: unknown): boolean {
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if (current.name === 'APIConnectionError' || current.name === 'APIConnectionTimeoutError') {
      return true;
    }
    if (current instanceof TypeError && current.message === 'fetch failed') {
      return true;
    }
    const code = 'code' in current ? current.code : undefined;
    if (typeof code === 'string' && CONNECTION_CODES.has(code)) {
      return true;
    }
    current = current.cause;
  }

  return false;
}

/** HTTP status carried by SDK errors (`status` for openai, `status_code` for ollama). */
export function httpStatusOf(error: unknown): number | undefined {
  if (!(error instanceof Error)) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('status_code' in error && typeof error.status_code === 'number') return error.status_code;
  return undefined;
}
