const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d{1,9})?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parses the auth response's DueDate into a Date
 * @param value - ISO-8601 string like 2026-10-19T15:30:00; no offset means UTC
 * @returns Date, or undefined when missing or unparseable
 */
const parseDueDate = (value: string | undefined): Date | undefined => {
  if (!value) return undefined;

  const match = value.trim().match(ISO_DATE_TIME);
  if (!match) return undefined;

  const [, year, month, day, hours = "00", minutes = "00", seconds = "00"] =
    match;
  const fraction = (match[7] ?? "").slice(0, 4);
  const zone = match[8] ?? "Z";
  const normalizedZone =
    zone === "Z" || zone.includes(":")
      ? zone
      : `${zone.slice(0, 3)}:${zone.slice(3)}`;

  const timestamp = Date.parse(
    `${year}-${month}-${day}T${hours}:${minutes}:${seconds}${fraction}${normalizedZone}`,
  );

  return Number.isNaN(timestamp) ? undefined : new Date(timestamp);
};

export { parseDueDate };
