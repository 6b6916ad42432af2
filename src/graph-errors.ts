import { GraphError } from '@microsoft/microsoft-graph-client';
import { DirectoryResponseError } from './errors';

export interface DirectoryErrorDescription {
  status: number;
  code: string | null;
  detail: string;
}

/**
 * Maps an error thrown by a directory call to an HTTP-like status, the
 * backend error code when there is one, and a message fit for a log line.
 */
export function describeDirectoryError(err: unknown): DirectoryErrorDescription {
  if (err instanceof GraphError) {
    return {
      status: err.statusCode > 0 ? err.statusCode : classify(err.message),
      code: err.code ?? null,
      detail: err.message,
    };
  }
  if (err instanceof DirectoryResponseError) {
    return { status: 502, code: 'invalidResponse', detail: err.message };
  }
  if (err instanceof Error) {
    return { status: classify(err.message), code: null, detail: err.message };
  }
  return { status: 500, code: null, detail: String(err) };
}

function classify(message: string): number {
  const msg = message.toLowerCase();

  if (msg.includes('throttl') || msg.includes('too many requests')) {
    return 429;
  }
  if (msg.includes('does not exist') || msg.includes('not found')) {
    return 404;
  }
  if (
    (msg.includes('access') && msg.includes('denied')) ||
    msg.includes('insufficient privileges')
  ) {
    return 403;
  }
  if (msg.includes('timeout') || msg.includes('timed out')) {
    return 504;
  }

  return 500;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}
