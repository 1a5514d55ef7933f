// JSON helpers shared by the parser, the invoker and the MCP decoder

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function safeStringify(value: unknown, space?: number): string {
  try {
    const serialized = JSON.stringify(value, null, space);
    return serialized === undefined ? String(value) : serialized;
  } catch {
    return String(value);
  }
}
