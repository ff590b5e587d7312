/**
 * Per-tier cache counters
 *
 * Each tier owns one instance. Counts and byte/duration sums only; there is
 * no histogram or percentile tracking.
 */

export type CounterSnapshot = {
  gets: number;
  hits: number;
  misses: number;
  getErrors: number;
  puts: number;
  putErrors: number;
  totalGetBytes: number;
  /** Milliseconds spent in successful gets */
  totalGetMs: number;
  totalPutBytes: number;
  /** Milliseconds spent in successful puts */
  totalPutMs: number;
};

export type CacheCounters = {
  countGet: () => void;
  countHit: () => void;
  countMiss: () => void;
  countGetError: () => void;
  countPut: () => void;
  countPutError: () => void;
  addGetTransfer: (bytes: number, ms: number) => void;
  addPutTransfer: (bytes: number, ms: number) => void;
  snapshot: () => CounterSnapshot;
};

export const CSV_COLUMNS = [
  "gets",
  "hits",
  "misses",
  "puts",
  "getErrors",
  "putErrors",
  "totalGetBytes",
  "totalGetDur",
  "totalPutBytes",
  "totalPutDur",
] as const;

export const emptySnapshot = (): CounterSnapshot => ({
  gets: 0,
  hits: 0,
  misses: 0,
  getErrors: 0,
  puts: 0,
  putErrors: 0,
  totalGetBytes: 0,
  totalGetMs: 0,
  totalPutBytes: 0,
  totalPutMs: 0,
});

/**
 * Create a zeroed set of counters
 */
export const createCacheCounters = (): CacheCounters => {
  const c = emptySnapshot();

  return {
    countGet: () => {
      c.gets++;
    },
    countHit: () => {
      c.hits++;
    },
    countMiss: () => {
      c.misses++;
    },
    countGetError: () => {
      c.getErrors++;
    },
    countPut: () => {
      c.puts++;
    },
    countPutError: () => {
      c.putErrors++;
    },
    addGetTransfer: (bytes, ms) => {
      c.totalGetBytes += bytes;
      c.totalGetMs += ms;
    },
    addPutTransfer: (bytes, ms) => {
      c.totalPutBytes += bytes;
      c.totalPutMs += ms;
    },
    snapshot: () => ({ ...c }),
  };
};

// ============================================================================
// Formatting
// ============================================================================

/**
 * Seconds rounded to the nearest 100ms, e.g. 1234 -> "1.2s"
 */
export const formatSeconds = (ms: number): string => {
  return `${Math.round(ms / 100) / 10}s`;
};

/**
 * Clock-style duration for spreadsheets: 3723004 -> "01:02:03.004"
 */
export const formatClockDuration = (ms: number): string => {
  const total = Math.max(0, Math.floor(ms));
  const millis = total % 1000;
  const seconds = Math.floor(total / 1000) % 60;
  const minutes = Math.floor(total / 60_000) % 60;
  const hours = Math.floor(total / 3_600_000);
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
};

const throughput = (bytes: number, ms: number): string => {
  const mb = bytes / 1_000_000;
  let line = `; total ${mb.toFixed(2)} MB`;
  if (ms > 0) {
    line += `; avg ${(mb / (ms / 1000)).toFixed(2)} MB/s`;
  }
  return line;
};

/**
 * Two-line human-readable summary (gets, then puts)
 */
export const formatSummary = (s: CounterSnapshot): string => {
  let getsLine = `${s.gets} gets: ${s.hits} hits, ${s.misses} misses, ${s.getErrors} errors, ${formatSeconds(s.totalGetMs)} total dur`;
  if (s.totalGetBytes > 0) {
    getsLine += throughput(s.totalGetBytes, s.totalGetMs);
  }
  let putsLine = `${s.puts} puts: ${s.putErrors} errors, ${formatSeconds(s.totalPutMs)} total dur`;
  if (s.totalPutBytes > 0) {
    putsLine += throughput(s.totalPutBytes, s.totalPutMs);
  }
  return `${getsLine}\n${putsLine}`;
};

/**
 * Fixed-column CSV export, one data row per snapshot
 */
export const formatCsv = (s: CounterSnapshot, options: { header?: boolean } = {}): string => {
  const row = [
    s.gets,
    s.hits,
    s.misses,
    s.puts,
    s.getErrors,
    s.putErrors,
    s.totalGetBytes,
    formatClockDuration(s.totalGetMs),
    s.totalPutBytes,
    formatClockDuration(s.totalPutMs),
  ].map(String);

  const lines = options.header ? [CSV_COLUMNS.join(","), row.join(",")] : [row.join(",")];
  return `${lines.join("\n")}\n`;
};
