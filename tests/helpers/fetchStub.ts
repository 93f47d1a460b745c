/** Request captured by {@link createFetchStub}. */
export interface RecordedRequest {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string | null;
}

/** Scripted reply: a response, an error to reject with, or a function computing either. */
export type FetchStep = Response | Error | ((init: RequestInit | undefined) => Promise<Response>);

/**
 * Returns a `fetch` replacement consuming {@link steps} in order and
 * recording every request. Running out of steps fails the test loudly.
 */
export function createFetchStub(steps: readonly FetchStep[], recorder: RecordedRequest[] = []): typeof fetch {
  const queue = [...steps];
  const stub: typeof fetch = async (input, init) => {
    recorder.push({
      url: input instanceof Request ? input.url : String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : null,
    });
    const step = queue.shift();
    if (step === undefined) {
      throw new Error(`unexpected request #${recorder.length}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    if (typeof step === "function") {
      return step(init);
    }
    return step;
  };
  return stub;
}

export function createJsonResponse(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function createTextResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { "content-type": "text/plain" } });
}

/** Step that never answers and rejects with an `AbortError` once the request is aborted. */
export function hangUntilAborted(): FetchStep {
  return (init) =>
    new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (!signal) {
        reject(new Error("request carried no abort signal"));
        return;
      }
      signal.addEventListener("abort", () => {
        const error = new Error("The operation was aborted");
        error.name = "AbortError";
        reject(error);
      });
    });
}
