/**
 * Date conversions for the timestamp formats the preservation encodings use.
 * A `null` Date stands for "no date recorded".
 */

/** Seconds between 1970-01-01 and 2000-01-01 UTC. */
const AS2K_UNIX_OFFSET = 946684800;
/** Seconds between 1904-01-01 and 1970-01-01 UTC. */
const HFS_UNIX_OFFSET = 2082844800;

const INVALID_AS2K_DATE = -0x80000000;
// "Bad Mac" archives write this, which is March 1932.
const INVALID_LE_AS2K_DATE = 0x80700000 | 0;

/**
 * AppleSingle v2 file dates: signed seconds since 2000-01-01 UTC.
 */
export function fromAS2KTime(when: number): Date | null {
  const signed = when | 0;
  if (signed === INVALID_AS2K_DATE || signed === INVALID_LE_AS2K_DATE) {
    return null;
  }
  return new Date((signed + AS2K_UNIX_OFFSET) * 1000);
}

export function toAS2KTime(when: Date | null): number {
  if (!when || Number.isNaN(when.getTime())) {
    return INVALID_AS2K_DATE;
  }
  const as2k = Math.floor(when.getTime() / 1000) - AS2K_UNIX_OFFSET;
  if (as2k < INVALID_AS2K_DATE || as2k > 0x7fffffff) {
    return INVALID_AS2K_DATE;
  }
  return as2k;
}

/**
 * ProDOS date/time pair, local time. The date word is `yyyyyyymmmmddddd`;
 * the time word holds the hour in bits 8-12 and the minute in bits 0-5.
 * Years below 40 are taken to be 2000-2039.
 */
export function fromProDOSTime(date: number, time: number): Date | null {
  if (date === 0 && time === 0) {
    return null;
  }
  let year = (date >> 9) & 0x7f;
  if (year < 40) {
    year += 100;
  }
  year += 1900;
  const month = (date >> 5) & 0x0f;
  const day = date & 0x1f;
  const minute = time & 0x3f;
  const hour = (time >> 8) & 0x1f;
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) {
    return null;
  }
  const result = new Date(year, month - 1, day, hour, minute, 0);
  // Reject dates the Date constructor rolled over, e.g. Feb 30.
  if (result.getDate() !== day) {
    return null;
  }
  return result;
}

export function toProDOSTime(when: Date | null): { date: number; time: number } {
  if (!when || Number.isNaN(when.getTime())) {
    return { date: 0, time: 0 };
  }
  const year = when.getFullYear();
  let proYear: number;
  if (year >= 1940 && year <= 2027) {
    proYear = year - 1900;
  } else if (year >= 2028 && year <= 2039) {
    proYear = year - 2000;
  } else {
    return { date: 0, time: 0 };
  }
  return {
    date: (proYear << 9) | ((when.getMonth() + 1) << 5) | when.getDate(),
    time: (when.getHours() << 8) | when.getMinutes()
  };
}

/**
 * HFS timestamps: unsigned seconds since 1904-01-01 in local time. The
 * fields are computed as if the value were UTC and then taken as local,
 * which keeps daylight saving shifts out of the result.
 */
export function fromHFSTime(when: number): Date | null {
  if (when === 0) {
    return null;
  }
  const utc = new Date(((when >>> 0) - HFS_UNIX_OFFSET) * 1000);
  return new Date(
    utc.getUTCFullYear(), utc.getUTCMonth(), utc.getUTCDate(),
    utc.getUTCHours(), utc.getUTCMinutes(), utc.getUTCSeconds()
  );
}

export function toHFSTime(when: Date | null): number {
  if (!when || Number.isNaN(when.getTime())) {
    return 0;
  }
  const asUtc = Date.UTC(
    when.getFullYear(), when.getMonth(), when.getDate(),
    when.getHours(), when.getMinutes(), when.getSeconds()
  ) / 1000;
  const hfs = asUtc + HFS_UNIX_OFFSET;
  if (hfs < 0 || hfs > 0xffffffff) {
    return 0;
  }
  return hfs;
}
