export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value)
}

type WritableLike = { write: (chunk: string) => unknown }

/** Writes one JSON document followed by a newline. */
export function printJson(value: unknown, pretty: boolean, stream: WritableLike = process.stdout): void {
  stream.write(`${formatJson(value, pretty)}\n`)
}
