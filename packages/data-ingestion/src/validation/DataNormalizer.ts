import { parsePhoneNumberFromString, type CountryCode } from 'libphonenumber-js';

export type Normalized<T> = { ok: true; value: T } | { ok: false; error: string };

const ok = <T>(value: T): Normalized<T> => ({ ok: true, value });
const fail = <T>(error: string): Normalized<T> => ({ ok: false, error });

const TRUE_VALUES = ['true', 'yes', 'y', '1'];
const FALSE_VALUES = ['false', 'no', 'n', '0'];

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Data normalization for the conformance layer.
 * Blank input normalizes to null; anything that cannot be read as the
 * requested type is a failure carrying a message for the violation.
 */
export class DataNormalizer {
  private readonly defaultCountry: CountryCode;

  constructor(defaultCountry: CountryCode = 'US') {
    this.defaultCountry = defaultCountry;
  }

  normalizeText(value: unknown): Normalized<string | null> {
    if (isBlank(value)) return ok(null);
    if (typeof value === 'string') return ok(value.trim());
    if (typeof value === 'number' || typeof value === 'boolean') return ok(String(value));
    return fail(`expected text, got ${Array.isArray(value) ? 'a list' : typeof value}`);
  }

  /**
   * Numbers with "$", thousands separators, a trailing period or parentheses for negatives
   */
  normalizeNumber(value: unknown): Normalized<number | null> {
    if (isBlank(value)) return ok(null);
    if (typeof value === 'number') {
      return Number.isFinite(value) ? ok(value) : fail(`${value} is not a finite number`);
    }
    if (typeof value !== 'string') return fail(`expected a number, got ${typeof value}`);

    let cleaned = value.trim().replace(/[$,\s]/g, '').replace(/\.$/, '');
    let sign = 1;
    if (/^\(.*\)$/.test(cleaned)) {
      sign = -1;
      cleaned = cleaned.slice(1, -1);
    }
    if (!/^[-+]?(\d+\.?\d*|\.\d+)$/.test(cleaned)) {
      return fail(`"${value}" is not a number`);
    }
    return ok(sign * Number(cleaned));
  }

  normalizeInteger(value: unknown): Normalized<number | null> {
    const result = this.normalizeNumber(value);
    if (!result.ok || result.value === null) return result;
    return Number.isInteger(result.value) ? result : fail(`"${String(value)}" is not a whole number`);
  }

  normalizeBoolean(value: unknown): Normalized<boolean | null> {
    if (isBlank(value)) return ok(null);
    if (typeof value === 'boolean') return ok(value);
    if (typeof value === 'number' && (value === 0 || value === 1)) return ok(value === 1);
    if (typeof value === 'string') {
      const lower = value.trim().toLowerCase();
      if (TRUE_VALUES.includes(lower)) return ok(true);
      if (FALSE_VALUES.includes(lower)) return ok(false);
    }
    return fail(`"${String(value)}" is not a boolean`);
  }

  /**
   * Calendar dates as YYYY-MM-DD. Accepts YYYY-MM-DD, M/D/YYYY and ISO timestamps
   * (the date part is kept as written, no timezone shift).
   */
  normalizeDate(value: unknown): Normalized<string | null> {
    if (isBlank(value)) return ok(null);
    if (typeof value !== 'string') return fail(`expected a date, got ${typeof value}`);

    const text = value.trim();
    const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/.exec(text);
    const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);

    let year: number;
    let month: number;
    let day: number;
    if (iso) {
      [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    } else if (us) {
      [month, day, year] = [Number(us[1]), Number(us[2]), Number(us[3])];
    } else {
      return fail(`"${text}" is not a recognised date`);
    }

    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return fail(`"${text}" is not a calendar date`);
    }
    return ok(`${pad(year, 4)}-${pad(month)}-${pad(day)}`);
  }

  /**
   * Lists are stored as JSON text. Accepts an array, a JSON array string or a
   * semicolon-separated string.
   */
  normalizeList(value: unknown): Normalized<string | null> {
    if (isBlank(value)) return ok(null);

    let items: unknown[];
    if (Array.isArray(value)) {
      items = value;
    } else if (typeof value === 'string' && value.trim().startsWith('[')) {
      try {
        const parsed: unknown = JSON.parse(value);
        if (!Array.isArray(parsed)) return fail(`"${value}" is not a list`);
        items = parsed;
      } catch {
        return fail(`"${value}" is not valid JSON`);
      }
    } else if (typeof value === 'string') {
      items = value.split(';');
    } else {
      return fail(`expected a list, got ${typeof value}`);
    }

    const strings: string[] = [];
    for (const item of items) {
      const text = this.normalizeText(item);
      if (!text.ok) return fail(`list item ${text.error}`);
      if (text.value !== null) strings.push(text.value);
    }
    return ok(JSON.stringify(strings));
  }

  /**
   * Normalize phone number to E.164 international format
   */
  normalizePhoneNumber(phoneNumber: string, country: CountryCode = this.defaultCountry): {
    normalized: string | null;
    original: string;
    isValid: boolean;
  } {
    const parsed = parsePhoneNumberFromString(phoneNumber, country);
    if (parsed && parsed.isValid()) {
      return { normalized: parsed.number, original: phoneNumber, isValid: true };
    }
    return { normalized: null, original: phoneNumber, isValid: false };
  }
}

export default DataNormalizer;
