export class ProviderError extends Error {
  readonly provider: string;
  readonly status?: number;

  constructor(provider: string, message: string, status?: number) {
    super(message);
    this.name = "ProviderError";
    this.provider = provider;
    this.status = status;
  }
}

export interface ServerSentEvent {
  event: string;
  data: string;
}

/** Splits a byte stream into lines; a trailing partial line is flushed at the end. */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) {
        break;
      }
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline >= 0) {
        yield buffer.slice(0, newline).replace(/\r$/, "");
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer) {
      yield buffer.replace(/\r$/, "");
    }
  } finally {
    reader.releaseLock();
  }
}

/** Groups `event:`/`data:` lines into events separated by blank lines. */
export async function* readServerSentEvents(lines: AsyncIterable<string>): AsyncIterable<ServerSentEvent> {
  let event = "message";
  let data: string[] = [];

  for await (const line of lines) {
    if (!line) {
      if (data.length) {
        yield { event, data: data.join("\n") };
      }
      event = "message";
      data = [];
      continue;
    }
    if (line.startsWith(":")) {
      continue;
    }

    const colon = line.indexOf(":");
    const field = colon >= 0 ? line.slice(0, colon) : line;
    const value = colon >= 0 ? line.slice(colon + 1).replace(/^ /, "") : "";
    if (field === "event") {
      event = value;
    } else if (field === "data") {
      data.push(value);
    }
  }

  if (data.length) {
    yield { event, data: data.join("\n") };
  }
}

/** Rejects a non-2xx response with a short excerpt of its body. */
export async function ensureOk(provider: string, response: Response): Promise<ReadableStream<Uint8Array>> {
  if (!response.ok) {
    const bodyText = await response.text();
    throw new ProviderError(provider, `${provider}_http_${response.status}:${bodyText.slice(0, 120)}`, response.status);
  }
  if (!response.body) {
    throw new ProviderError(provider, `${provider} returned an empty body`);
  }
  return response.body;
}
