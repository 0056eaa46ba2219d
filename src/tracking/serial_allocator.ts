import { DecodedSerial } from '../domain/types';
import { AllocationExhaustedError, DuplicateSerialError, InvalidFormatError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

// Serial layout: <year letter><month letter><first:3>-<second:3>M, e.g. LC004-017M.
const BASE_YEAR = 2025;
const BASE_YEAR_LETTER = 'K';
const LAST_YEAR_LETTER = 'Z';
const COUNTER_MIN = 1;
const COUNTER_MAX = 999;
const SERIAL_PATTERN = /^([K-Z])([A-L])(\d{3})-(\d{3})M$/;

const LAST_SUPPORTED_YEAR = BASE_YEAR + (LAST_YEAR_LETTER.charCodeAt(0) - BASE_YEAR_LETTER.charCodeAt(0));

export interface Counters {
  first: number;
  second: number;
}

export function bucketFor(date: Date): string {
  const year = date.getFullYear();
  if (year < BASE_YEAR || year > LAST_SUPPORTED_YEAR) {
    throw new ValidationError(
      `Year ${year} cannot be encoded; supported years are ${BASE_YEAR}-${LAST_SUPPORTED_YEAR}`,
      'date',
      date.toISOString(),
    );
  }
  const yearLetter = String.fromCharCode(BASE_YEAR_LETTER.charCodeAt(0) + (year - BASE_YEAR));
  const monthLetter = String.fromCharCode('A'.charCodeAt(0) + date.getMonth());
  return `${yearLetter}${monthLetter}`;
}

export function encodeSerial(bucket: string, counters: Counters): string {
  const pad = (n: number) => n.toString().padStart(3, '0');
  const serial = `${bucket}${pad(counters.first)}-${pad(counters.second)}M`;
  if (!isValidSerial(serial)) {
    throw new InvalidFormatError(serial);
  }
  return serial;
}

export function decodeSerial(serial: string): DecodedSerial {
  const match = SERIAL_PATTERN.exec(serial);
  if (!match) {
    throw new InvalidFormatError(serial);
  }
  const [, yearLetter, monthLetter, firstDigits, secondDigits] = match;
  const first = parseInt(firstDigits, 10);
  const second = parseInt(secondDigits, 10);
  if (first < COUNTER_MIN || second < COUNTER_MIN) {
    throw new InvalidFormatError(serial);
  }
  return {
    bucket: `${yearLetter}${monthLetter}`,
    yearLetter,
    monthLetter,
    year: BASE_YEAR + (yearLetter.charCodeAt(0) - BASE_YEAR_LETTER.charCodeAt(0)),
    month: monthLetter.charCodeAt(0) - 'A'.charCodeAt(0) + 1,
    first,
    second,
  };
}

export function isValidSerial(serial: string): boolean {
  try {
    decodeSerial(serial);
    return true;
  } catch (error) {
    if (error instanceof InvalidFormatError) return false;
    throw error;
  }
}

// Counters that follow `previous`; the second counter rolls over into the first.
export function nextCounters(bucket: string, previous: Counters | null): Counters {
  if (!previous) {
    return { first: COUNTER_MIN, second: COUNTER_MIN };
  }
  if (previous.second < COUNTER_MAX) {
    return { first: previous.first, second: previous.second + 1 };
  }
  if (previous.first >= COUNTER_MAX) {
    throw new AllocationExhaustedError(bucket, `${encodeSerial(bucket, previous)} is the last code of the month`);
  }
  return { first: previous.first + 1, second: COUNTER_MIN };
}

export interface SerialStore {
  findHighestInBucket(bucket: string): Promise<string | null>;
}

// Allocates serial numbers by scanning for the greatest code of the bucket.
// There is no counter table: the unique constraint on the serial column is
// the arbiter, and a lost race is retried from the code that collided.
export class SerialAllocator {
  constructor(
    private readonly store: SerialStore,
    private readonly maxAttempts = 100,
  ) {}

  async allocate<T>(bucket: string, insert: (serialNumber: string) => Promise<T>): Promise<T> {
    let collided: string | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const highest = await this.store.findHighestInBucket(bucket);
      const base = collided !== null && (highest === null || collided > highest) ? collided : highest;
      if (base !== null && decodeSerial(base).bucket !== bucket) {
        throw new InvalidFormatError(base);
      }
      const candidate = encodeSerial(bucket, nextCounters(bucket, base === null ? null : decodeSerial(base)));

      try {
        return await insert(candidate);
      } catch (error) {
        if (!(error instanceof DuplicateSerialError)) {
          throw error;
        }
        logger.warn('Serial number collision, retrying', { bucket, serialNumber: candidate, attempt });
        collided = candidate;
      }
    }

    throw new AllocationExhaustedError(bucket, `no free code after ${this.maxAttempts} attempts`);
  }
}
