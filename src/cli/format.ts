export function displayName(firstname: string | null, lastname: string | null): string {
  const name = [firstname, lastname].filter((part): part is string => !!part && part.trim() !== "").join(" ");
  return name || "Unknown athlete";
}

export function formatKm(meters: number): string {
  return `${(meters / 1000).toFixed(2)} km`;
}

/** Right-pads or truncates to exactly `width` characters. */
export function fit(text: string, width: number): string {
  if (text.length > width) return `${text.slice(0, width - 1)}…`;
  return text.padEnd(width);
}
