// The cluster cannot be used at all: no kubeconfig, unknown context, API unreachable or
// unauthenticated. Nothing partial can be reported after one of these.
export class FatalConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FatalConfigurationError';
  }
}

// A single query (one namespace, one resource kind) failed. Recorded on the entity, the run goes on.
export class DataFetchError extends Error {
  readonly resource: string;
  readonly statusCode: number | undefined;

  constructor(message: string, resource: string, statusCode?: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DataFetchError';
    this.resource = resource;
    this.statusCode = statusCode;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function messageFromBody(body: unknown): string | undefined {
  if (typeof body === 'string') {
    try {
      const parsed: unknown = JSON.parse(body);
      if (isRecord(parsed) && typeof parsed.message === 'string') return parsed.message;
    } catch {
      return body || undefined;
    }
    return undefined;
  }
  if (isRecord(body) && typeof body.message === 'string') return body.message;
  return undefined;
}

// Extract a human-readable message from a K8s API error.
// Tries multiple paths where the K8s client may place the error message.
export function extractK8sErrorMessage(e: unknown, fallbackContext: string): string {
  if (!isRecord(e)) {
    return typeof e === 'string' && e ? e : `Unknown error for ${fallbackContext}`;
  }

  const fromBody = messageFromBody(e.body);
  if (fromBody) return fromBody;

  if (isRecord(e.response)) {
    const fromResponse = messageFromBody(e.response.body);
    if (fromResponse) return fromResponse;
  }

  if (typeof e.message === 'string' && e.message) return e.message;

  return `Unknown error for ${fallbackContext}`;
}

// HTTP status of a client error: `code` on the generated API exceptions, `statusCode` on older responses
export function getStatusCode(e: unknown): number | undefined {
  if (!isRecord(e)) return undefined;
  if (typeof e.code === 'number') return e.code;
  if (typeof e.statusCode === 'number') return e.statusCode;
  if (isRecord(e.response) && typeof e.response.statusCode === 'number') return e.response.statusCode;
  return undefined;
}

export function toDataFetchError(e: unknown, resource: string): DataFetchError {
  if (e instanceof DataFetchError) return e;
  const statusCode = getStatusCode(e);
  return new DataFetchError(extractK8sErrorMessage(e, resource), resource, statusCode, { cause: e });
}
