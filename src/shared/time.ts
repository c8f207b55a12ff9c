function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

function pad3(value: number): string {
  return String(value).padStart(3, "0");
}

/**
 * Current time as ISO 8601 in the host's local timezone, with offset.
 *
 * Example output: 2026-01-27T16:30:00.123-08:00
 */
export function nowLocalIso(): string {
  return formatDateAsLocalOffset(new Date());
}

export function formatDateAsLocalOffset(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? "+" : "-";
  const abs = Math.abs(offsetMinutes);
  const offsetHour = pad2(Math.floor(abs / 60));
  const offsetMinute = pad2(abs % 60);

  const year = date.getFullYear();
  const month = pad2(date.getMonth() + 1);
  const day = pad2(date.getDate());
  const hour = pad2(date.getHours());
  const minute = pad2(date.getMinutes());
  const second = pad2(date.getSeconds());
  const millis = pad3(date.getMilliseconds());

  return `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${sign}${offsetHour}:${offsetMinute}`;
}
