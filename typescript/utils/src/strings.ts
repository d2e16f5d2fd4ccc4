function trimToLength(value: string, maxLength: number) {
  if (!value) return '';
  const trimmed = value.trim();
  return trimmed.length > maxLength
    ? trimmed.substring(0, maxLength) + '...'
    : trimmed;
}

export function errorToString(error: unknown, maxLength = 300): string {
  if (!error) return 'Unknown Error';
  if (typeof error === 'string') return trimToLength(error, maxLength);
  if (typeof error === 'number') return `Error code: ${error}`;
  if (error instanceof Error) return trimToLength(error.message, maxLength);
  return trimToLength(JSON.stringify(error), maxLength);
}

// Upper-cases and replaces anything but letters and digits with underscores,
// e.g. `fuji-ankr` + `C-Chain` => `FUJI_ANKR_C_CHAIN`
export function toEnvVarSegment(value: string) {
  return value.toUpperCase().replace(/[^A-Z0-9]/g, '_');
}
