export function isHttpUrl(value?: string | null) {
  try {
    if (!value) return false;
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
