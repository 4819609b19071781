// src/callModules/phone-number/phone-number.normalizer.ts
import { Injectable } from '@nestjs/common';
import {
  parsePhoneNumberFromString,
  isSupportedCountry,
  type CountryCode,
} from 'libphonenumber-js';

import { InvalidPhoneNumberError } from '../../common/errors/call-errors';
import { NormalizedPhone } from './interface/normalized-phone.interface';

const CALLING_CODE = /^\+?(\d{1,3})$/;

type ParseOptions = { defaultCountry?: CountryCode; defaultCallingCode?: string };

const isCountryCode = (value: string): value is CountryCode => isSupportedCountry(value);

/**
 * Accepts an ISO region ("US", "gb") or a calling code ("+1", "44") as the
 * fallback for numbers written without an international prefix.
 */
export function isValidDefaultCountry(value: string): boolean {
  const v = value.trim();
  return CALLING_CODE.test(v) || isCountryCode(v.toUpperCase());
}

function toParseOptions(defaultCountry?: string): ParseOptions {
  const v = defaultCountry?.trim();
  if (!v) return {};

  const callingCode = v.match(CALLING_CODE);
  if (callingCode) return { defaultCallingCode: callingCode[1] };

  const region = v.toUpperCase();
  if (isCountryCode(region)) return { defaultCountry: region };

  throw new RangeError(`Unsupported default country "${defaultCountry}"`);
}

@Injectable()
export class PhoneNumberNormalizer {
  /**
   * Parses `raw` into E.164. Numbers that already carry a "+" prefix ignore
   * `defaultCountry`, so normalizing an `e164` value again is a no-op.
   *
   * @throws InvalidPhoneNumberError when no plausible country yields a valid number
   */
  normalize(raw: string, defaultCountry?: string): NormalizedPhone {
    const input = (raw ?? '').trim();
    if (!input) throw new InvalidPhoneNumberError(raw, 'no phone number provided');
    if (!/\d/.test(input)) throw new InvalidPhoneNumberError(raw, 'contains no digits');

    const parsed = parsePhoneNumberFromString(input, toParseOptions(defaultCountry));
    if (!parsed) throw new InvalidPhoneNumberError(raw, 'could not be parsed');
    if (!parsed.isValid()) throw new InvalidPhoneNumberError(raw, 'not a valid number for its country');

    return Object.freeze({
      e164: parsed.number,
      countryCode: parsed.countryCallingCode,
      ...(parsed.country ? { region: parsed.country } : {}),
    });
  }
}
