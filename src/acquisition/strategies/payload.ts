export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readString = (record: Record<string, unknown>, key: string): string | null => {
  const value = record[key];
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
};

export const readRecord = (record: Record<string, unknown>, key: string): Record<string, unknown> | null => {
  const value = record[key];
  return isRecord(value) ? value : null;
};

export const readRecordArray = (record: Record<string, unknown>, key: string): Array<Record<string, unknown>> => {
  const value = record[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
};

export const readStringList = (record: Record<string, unknown>, key: string): string[] => {
  const value = record[key];
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string" && entry.trim().length > 0);
  }
  if (typeof value === "string") {
    return value
      .split(/[,，;；\s]+/)
      .map((entry) => entry.trim())
      .filter(Boolean);
  }
  return [];
};
