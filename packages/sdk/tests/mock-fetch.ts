/**
 * Scripted fetch stand-in for SDK tests.
 */

export interface MockReply {
  readonly status: number;
  readonly body?: unknown;
  readonly headers?: Record<string, string>;
  readonly error?: unknown;
}

export interface RecordedCall {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string | undefined;
}

export interface MockFetch {
  readonly fetchFn: typeof fetch;
  readonly calls: RecordedCall[];
}

export function createMockFetch(replies: readonly MockReply[]): MockFetch {
  const calls: RecordedCall[] = [];

  const fetchFn = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    calls.push({
      url: typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    });

    const reply = replies[calls.length - 1];
    if (reply === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${String(calls.length)})`);
    }
    if (reply.error !== undefined) {
      throw reply.error;
    }

    const body = reply.body === undefined ? "" : typeof reply.body === "string" ? reply.body : JSON.stringify(reply.body);
    return new Response(body, {
      status: reply.status,
      headers: { "content-type": "application/json", ...reply.headers },
    });
  };

  return { fetchFn, calls };
}
