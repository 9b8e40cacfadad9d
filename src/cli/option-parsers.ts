export function parseIntOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Expected an integer, got: ${value}`);
  }
  return parsed;
}

export function parsePositiveNumberOption(value: string): number {
  const parsed = Number(value.trim());
  if (!value.trim() || !Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive number, got: ${value}`);
  }
  return parsed;
}
