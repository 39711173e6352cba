/**
 * Upper-cases the first letter of every run of letters and lower-cases the
 * rest, so `"maine coon"` becomes `"Maine Coon"` and `"blue-gray"` becomes
 * `"Blue-Gray"`.
 */
export function toTitleCase(value: string): string {
  return value.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}

/** Trimmed value, or null when nothing but whitespace was given. */
export function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
