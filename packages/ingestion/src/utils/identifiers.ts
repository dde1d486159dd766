// Telegram ids arrive as numbers, bigints or big-integer objects.
export function toIdentifierText(value: unknown): string | null {
  let text: string;
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) return null;
    text = String(value);
  } else if (typeof value === 'bigint' || typeof value === 'string') {
    text = value.toString().trim();
  } else if (typeof value === 'object' && value !== null) {
    text = String(value).trim();
  } else {
    return null;
  }
  return /^-?\d+$/.test(text) ? text : null;
}

export function toIdentifier(value: unknown): number | null {
  const text = toIdentifierText(value);
  if (text === null) return null;
  const parsed = Number(text);
  return Number.isSafeInteger(parsed) ? parsed : null;
}
