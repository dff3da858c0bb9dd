export const TRANSACTION_LOG_HEADER = [
  'timestamp',
  'action',
  'product_id',
  'product_name',
  'quantity',
  'details',
] as const;

const NEEDS_QUOTING = /[",\r\n]/;

function escapeField(field: string | number): string {
  const text = String(field);
  if (!NEEDS_QUOTING.test(text)) {
    return text;
  }
  return `"${text.replace(/"/g, '""')}"`;
}

export function formatCsvRow(fields: readonly (string | number)[]): string {
  return fields.map(escapeField).join(',');
}

const pad = (value: number): string => String(value).padStart(2, '0');

// YYYY-MM-DD HH:MM:SS, local time
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
