import type { Readable } from "node:stream"

export async function* readLinesFromStream(stream: Readable | null): AsyncGenerator<string> {
  if (!stream) return

  const chunks: AsyncIterable<unknown> = stream
  const decoder = new TextDecoder()
  let buffer = ""

  for await (const chunk of chunks) {
    if (typeof chunk === "string") buffer += chunk
    else if (chunk instanceof Uint8Array) buffer += decoder.decode(chunk, { stream: true })
    else continue

    while (true) {
      const idx = buffer.indexOf("\n")
      if (idx === -1) break
      const line = buffer.slice(0, idx)
      buffer = buffer.slice(idx + 1)
      yield stripCarriageReturn(line)
    }
  }

  buffer += decoder.decode()
  if (buffer.length > 0) {
    yield stripCarriageReturn(buffer)
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line
}

/**
 * Split captured output into lines, dropping the newline that ends the last one.
 */
export function splitLines(text: string): string[] {
  const body = text.endsWith("\n") ? text.slice(0, -1) : text
  return body.length === 0 ? [] : body.split("\n").map(stripCarriageReturn)
}
