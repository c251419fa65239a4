/**
 * JSON.stringify replacer that drops null-valued properties, so absent readings
 * are left out of API responses and WebSocket frames. Array slots are kept.
 */
export function omitNulls(this: unknown, key: string, value: unknown): unknown {
  if (value === null && key !== '' && !Array.isArray(this)) {
    return undefined;
  }
  return value;
}

export function toJson(value: unknown): string {
  return JSON.stringify(value, omitNulls);
}
