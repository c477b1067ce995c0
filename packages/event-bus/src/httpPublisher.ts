import {
  EventPublisher,
  EventPublisherHandleBase,
  EventPublisherProxyOptions,
  headerHasName,
  normalizeStringValue,
  normalizeWorkflowEvent,
  resolveProxyToken,
  workflowEventEnvelopeSchema
} from './core';

export type EventProxyPublisherOptions = {
  proxyUrl?: string | null;
  proxy?: EventPublisherProxyOptions;
  fetchImpl?: typeof fetch;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseBody(rawBody: string | null): unknown {
  if (!rawBody || rawBody.length === 0) {
    return null;
  }
  try {
    return JSON.parse(rawBody);
  } catch {
    return rawBody;
  }
}

export function createEventProxyPublisher<TOptions = unknown>(
  options: EventProxyPublisherOptions = {}
): EventPublisherHandleBase<null, TOptions> {
  const proxyUrl = normalizeStringValue(options.proxy?.url) ?? normalizeStringValue(options.proxyUrl);

  if (!proxyUrl) {
    throw new Error('Event proxy URL is not configured. Set EVENT_PROXY_URL or provide proxyUrl.');
  }

  const defaultFetch = typeof globalThis.fetch === 'function' ? globalThis.fetch.bind(globalThis) : undefined;
  const fetchImpl = options.fetchImpl ?? defaultFetch;

  if (!fetchImpl) {
    throw new Error('Fetch API is not available. Provide fetchImpl when using the HTTP event proxy.');
  }

  let closed = false;

  const publish: EventPublisher<TOptions> = async (event) => {
    if (closed) {
      throw new Error('Event publisher is closed');
    }

    const envelope = normalizeWorkflowEvent(event);
    const headers: Record<string, string> = { ...(options.proxy?.headers ?? {}) };

    if (!headerHasName(headers, 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }

    if (!headerHasName(headers, 'authorization')) {
      const tokenValue = await resolveProxyToken(options.proxy?.token);
      if (tokenValue) {
        headers.Authorization = `Bearer ${tokenValue}`;
      }
    }

    const response = await fetchImpl(proxyUrl, {
      method: 'POST',
      headers,
      body: JSON.stringify(envelope)
    });

    let rawBody: string | null;
    try {
      rawBody = await response.text();
    } catch {
      rawBody = null;
    }
    const responseBody = parseBody(rawBody);

    if (!response.ok) {
      if (isRecord(responseBody) && typeof responseBody.error === 'string' && responseBody.error.trim().length > 0) {
        throw new Error(responseBody.error);
      }
      throw new Error(`Event proxy responded with status ${response.status}`);
    }

    if (isRecord(responseBody)) {
      const nested = isRecord(responseBody.data) ? responseBody.data.event : undefined;
      const echoed = workflowEventEnvelopeSchema.safeParse(nested ?? responseBody.event);
      if (echoed.success) {
        return echoed.data;
      }
    }

    return envelope;
  };

  const close = async () => {
    closed = true;
  };

  return {
    publish,
    close,
    queue: null
  } satisfies EventPublisherHandleBase<null, TOptions>;
}
