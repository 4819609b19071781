import type { CountryCode } from 'libphonenumber-js';

export interface NormalizedPhone {
  readonly e164: string;
  /** Calling code without the leading "+", e.g. "1" or "44". */
  readonly countryCode: string;
  /** ISO 3166-1 alpha-2 region, when the number maps to exactly one. */
  readonly region?: CountryCode;
}
