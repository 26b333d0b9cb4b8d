/**
 * Helpers for stubbing the global fetch in client tests
 */

export function createMockResponse(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export function createMockErrorResponse(message: string, status: number, headers: Record<string, string> = {}): Response {
  return createMockResponse({ message }, status, headers);
}

export function createNetworkError(): TypeError {
  return new TypeError('Failed to fetch');
}

export function createTimeoutAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Request URL of a fetch call, whatever form the input took
 */
export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}
