type IntRange = Readonly<{
  min?: number;
  max?: number;
}>;

export function parseInteger(
  raw: string | undefined,
  fallback: number,
  range?: IntRange,
): number {
  if (!raw) return fallback;

  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed)) return fallback;
  if (range?.min !== undefined && parsed < range.min) return fallback;
  if (range?.max !== undefined && parsed > range.max) return fallback;
  return parsed;
}

export function parseText(raw: string | undefined): string {
  return raw?.trim() ?? "";
}

export function parseChoice<T extends string>(
  raw: string | undefined,
  choices: readonly T[],
  fallback: T,
): T {
  const normalized = parseText(raw).toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
}
