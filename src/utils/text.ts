const COUNTRY_CODE_PATTERN = /^[A-Za-z]{2}$/;
const SCHEME_PATTERN = /^https?:\/\//i;

export function normalizeName(value: string): string {
  return value.trim().toLowerCase();
}

export function isCountryCodeFormat(value: string): boolean {
  return COUNTRY_CODE_PATTERN.test(value);
}

export function normalizeCountryCode(value: string): string | null {
  const trimmed = value.trim();
  if (!isCountryCodeFormat(trimmed)) {
    return null;
  }
  return trimmed.toUpperCase();
}

// REST Countries sometimes sends links without a scheme (goo.gl/maps/...)
export function ensureHttpsUrl(value: string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  if (SCHEME_PATTERN.test(trimmed)) {
    return trimmed;
  }

  return `https://${trimmed.replace(/^\/+/, '')}`;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
