const pad = (value: number): string => value.toString().padStart(2, '0');

/**
 * Formats a date in local time as YYYY-MM-DD HH:MM.
 */
export const formatLocalDateTime = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}`;

export const formatGeneratedDescription = (date: Date): string =>
  `Generated: ${formatLocalDateTime(date)}`;
