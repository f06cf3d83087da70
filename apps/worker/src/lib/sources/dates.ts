export function parseDate(value: string | null | undefined) {
  if (!value || !value.trim()) return null;
  const date = new Date(value.trim());
  return Number.isNaN(date.getTime()) ? null : date;
}
