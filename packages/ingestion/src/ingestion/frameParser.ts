export type StreamFrame =
  | { kind: "data"; data: string }
  | { kind: "retry"; delayMs: number };

/**
 * Line-at-a-time event-stream framing. `data:` lines accumulate until a blank
 * line closes the frame; `retry:` takes effect on its own line. Comments,
 * `event:` and `id:` fields are ignored.
 */
export interface FrameParser {
  pushLine(line: string): StreamFrame | null;
  reset(): void;
}

function fieldValue(line: string, field: string): string {
  const value = line.slice(field.length + 1);
  return value.startsWith(" ") ? value.slice(1) : value;
}

export function createFrameParser(): FrameParser {
  let dataLines: string[] = [];

  return {
    pushLine(rawLine: string): StreamFrame | null {
      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

      if (line.length === 0) {
        if (dataLines.length === 0) {
          return null;
        }
        const data = dataLines.join("\n");
        dataLines = [];
        return { kind: "data", data };
      }

      if (line.startsWith(":")) {
        return null;
      }

      if (line.startsWith("data:")) {
        dataLines.push(fieldValue(line, "data"));
        return null;
      }

      if (line.startsWith("retry:")) {
        const value = fieldValue(line, "retry").trim();
        return /^\d+$/.test(value)
          ? { kind: "retry", delayMs: Number.parseInt(value, 10) }
          : null;
      }

      return null;
    },

    reset(): void {
      dataLines = [];
    }
  };
}

/** Splits a byte stream into text lines; a final line without a newline is still yielded. */
export async function* readLines(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let settled = false;

  const readChunk = async () => {
    try {
      const chunk = await reader.read();
      settled = chunk.done;
      return chunk;
    } catch (error) {
      settled = true;
      throw error;
    }
  };

  try {
    while (true) {
      const chunk = await readChunk();
      if (chunk.done) {
        break;
      }

      buffer += decoder.decode(chunk.value, { stream: true });
      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        yield buffer.slice(0, newline);
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer;
    }
  } finally {
    // A consumer that stops early leaves the connection open otherwise.
    if (!settled) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
