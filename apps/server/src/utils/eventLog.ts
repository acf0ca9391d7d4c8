export type LogFields = Record<string, unknown>

// One JSON object per line, `evt` first
export function logEvent(evt: string, fields: LogFields = {}): void {
  console.log(JSON.stringify({ evt, ...fields, timestamp: new Date().toISOString() }))
}

export function logError(evt: string, error: unknown, fields: LogFields = {}): void {
  const message = error instanceof Error ? error.message : String(error)
  console.error(JSON.stringify({ evt, ...fields, error: message, timestamp: new Date().toISOString() }))
}
