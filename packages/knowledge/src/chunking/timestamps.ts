const MONTHS: Record<string, string> = {
  jan: '01',
  feb: '02',
  mar: '03',
  apr: '04',
  may: '05',
  jun: '06',
  jul: '07',
  aug: '08',
  sep: '09',
  oct: '10',
  nov: '11',
  dec: '12',
};

interface TimestampPattern {
  pattern: RegExp;
  normalize: (match: RegExpExecArray) => string | null;
}

const PATTERNS: TimestampPattern[] = [
  // 2024-01-15T10:30:45.123Z
  {
    pattern: /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})?/g,
    normalize: (m) => m[0],
  },
  // 2024-01-15 10:30:45
  {
    pattern: /\d{4}-\d{2}-\d{2}\s+\d{2}:\d{2}:\d{2}(?:\.\d+)?/g,
    normalize: (m) => m[0].replace(/\s+/, 'T'),
  },
  // 15/Jan/2024:10:30:45 (Apache and nginx access logs)
  {
    pattern: /(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}:\d{2}:\d{2})/g,
    normalize: (m) => {
      const month = MONTHS[(m[2] ?? '').toLowerCase()];
      return month ? `${m[3]}-${month}-${m[1]}T${m[4]}` : null;
    },
  },
];

export function extractTimestamps(text: string): string[] {
  const timestamps: string[] = [];
  for (const { pattern, normalize } of PATTERNS) {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      const normalized = normalize(match);
      if (normalized) timestamps.push(normalized);
    }
  }
  return timestamps;
}

/**
 * Earliest and latest timestamp in `text`, compared as ISO strings.
 */
export function timestampRange(text: string): [string, string] | null {
  const timestamps = extractTimestamps(text).sort();
  const first = timestamps[0];
  const last = timestamps[timestamps.length - 1];
  return first !== undefined && last !== undefined ? [first, last] : null;
}
