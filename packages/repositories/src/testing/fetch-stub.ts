// Fetch stub for exercising the REST clients without a network

export type StubRoute = {
  status?: number;
  /** JSON body; omitted for empty responses */
  body?: unknown;
};

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
};

/**
 * Create a fetch implementation answering from a route table keyed by
 * "METHOD url" or plain url (for GET). Unknown routes answer 404.
 */
export function createFetchStub(routes: Record<string, StubRoute>): {
  fetch: typeof fetch;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetchStub: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const method = init?.method ?? 'GET';
    const headers = new Headers(init?.headers);
    const recordedHeaders: Record<string, string> = {};
    headers.forEach((value, key) => {
      recordedHeaders[key] = value;
    });
    requests.push({
      url,
      method,
      headers: recordedHeaders,
      body: typeof init?.body === 'string' ? init.body : undefined,
    });

    const route = routes[`${method} ${url}`] ?? (method === 'GET' ? routes[url] : undefined);
    if (!route) {
      return new Response(JSON.stringify({ message: 'Not Found' }), { status: 404 });
    }
    if (route.body === undefined) {
      return new Response(null, { status: route.status ?? 204 });
    }
    return new Response(JSON.stringify(route.body), {
      status: route.status ?? 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  return { fetch: fetchStub, requests };
}
