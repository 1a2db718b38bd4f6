export function toUtcIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoSeconds(): string {
  return toUtcIsoSeconds(new Date());
}

export function nowUtcIsoFileSafe(): string {
  return nowUtcIsoSeconds().replace(/:/g, "-");
}
