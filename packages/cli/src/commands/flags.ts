import { UsageError } from '@constify/shared';

export function parseIntFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new UsageError(`${flag} expects a whole number, got "${value}"`);
  }
  return Number(value);
}

/** Parses a non-negative number of seconds into milliseconds. */
export function parseSecondsFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new UsageError(`${flag} expects a number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}

export function parseChoice<T extends string>(
  flag: string,
  value: string | undefined,
  choices: readonly T[],
): T | undefined {
  if (value === undefined) return undefined;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new UsageError(`${flag} must be one of ${choices.join(', ')}, got "${value}"`);
  }
  return match;
}

/**
 * `--endpoint` takes the API root; the full chat completions URL is accepted too.
 */
export function normalizeEndpoint(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value.replace(/\/+$/, '').replace(/\/chat\/completions$/, '');
}

/** Extensions are matched with their leading dot. */
export function normalizeExtensions(values: string[] | undefined): string[] | undefined {
  return values?.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}
