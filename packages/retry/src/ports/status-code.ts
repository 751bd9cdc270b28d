/**
 * Canonical RPC status codes (the gRPC set).
 */
export const StatusCode = {
  OK: 0,
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  FAILED_PRECONDITION: 9,
  ABORTED: 10,
  OUT_OF_RANGE: 11,
  UNIMPLEMENTED: 12,
  INTERNAL: 13,
  UNAVAILABLE: 14,
  DATA_LOSS: 15,
  UNAUTHENTICATED: 16,
} as const

export type StatusName = keyof typeof StatusCode

export type StatusCode = (typeof StatusCode)[StatusName]

const names = new Map<number, StatusName>()
for (const [name, code] of Object.entries(StatusCode)) {
  if (isStatusName(name)) names.set(code, name)
}

export function isStatusName(value: string): value is StatusName {
  return Object.hasOwn(StatusCode, value)
}

export function isStatusCode(value: number): value is StatusCode {
  return names.has(value)
}

/** Name for logs and messages; codes outside the set render as `CODE_<n>`. */
export function statusName(code: number): string {
  return names.get(code) ?? `CODE_${code}`
}
