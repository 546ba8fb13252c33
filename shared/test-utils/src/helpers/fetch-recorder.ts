/**
 * Recording stand-in for `fetch`, for exporters and clients that accept a
 * `fetchImpl`.
 */

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
}

export type FetchResponder = (request: RecordedRequest) => Response | Promise<Response>;

export interface FetchRecorder {
  fetchImpl: typeof fetch;
  requests: RecordedRequest[];
  /** Parsed JSON bodies of the recorded requests */
  jsonBodies(): unknown[];
}

/**
 * @param respond - defaults to an empty 200 JSON response
 */
export function createFetchRecorder(
  respond: FetchResponder = () => new Response('{}', { status: 200 })
): FetchRecorder {
  const requests: RecordedRequest[] = [];

  const fetchImpl: typeof fetch = async (input, init) => {
    const request: RecordedRequest = {
      url: typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
      method: init?.method ?? 'GET',
      headers: headersOf(init?.headers),
      body: typeof init?.body === 'string' ? init.body : '',
    };
    requests.push(request);
    return respond(request);
  };

  return {
    fetchImpl,
    requests,
    jsonBodies: () => requests.map(request => JSON.parse(request.body)),
  };
}

function headersOf(headers: RequestInit['headers']): Record<string, string> {
  const result: Record<string, string> = {};
  if (!headers) return result;
  new Headers(headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
}
