const longDate = new Intl.DateTimeFormat("en-US", {
  month: "long",
  day: "2-digit",
  year: "numeric",
});

const fullDate = new Intl.DateTimeFormat("en-US", {
  weekday: "long",
  month: "long",
  day: "2-digit",
  year: "numeric",
});

/** e.g. "October 08, 2026" */
export function formatLongDate(date: Date): string {
  return longDate.format(date);
}

/** e.g. "Thursday, October 08, 2026" */
export function formatFullDate(date: Date): string {
  return fullDate.format(date);
}

export function formatSubject(newsletterName: string, date: Date): string {
  return `${newsletterName} - ${formatLongDate(date)}`;
}
