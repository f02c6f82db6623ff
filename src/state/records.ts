export type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
  Boolean(value) && typeof value === "object" && !Array.isArray(value);

export const readString = ({ record, key }: { record: JsonRecord; key: string }): string | null => {
  const value = record[key];
  return typeof value === "string" && value.length > 0 ? value : null;
};

export const readNumber = ({ record, key }: { record: JsonRecord; key: string }): number | null => {
  const value = record[key];
  return typeof value === "number" && Number.isFinite(value) ? value : null;
};

export const readOptionalString = ({
  record,
  key,
}: {
  record: JsonRecord;
  key: string;
}): string | undefined => readString({ record, key }) ?? undefined;

export const readOptionalRecord = ({
  record,
  key,
}: {
  record: JsonRecord;
  key: string;
}): JsonRecord | undefined => {
  const value = record[key];
  return isRecord(value) ? value : undefined;
};

export const parseTimestampMs = ({ value }: { value: string }): number | null => {
  const ms = new Date(value).getTime();
  return Number.isFinite(ms) ? ms : null;
};

const SAFE_ID = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

/** Ids become file names, so they are limited to a conservative character set. */
export const isSafeId = (value: string): boolean => SAFE_ID.test(value) && !value.includes("..");
