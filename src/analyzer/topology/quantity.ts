const BINARY: Record<string, number> = {
  Ki: 1024,
  Mi: 1024 ** 2,
  Gi: 1024 ** 3,
  Ti: 1024 ** 4,
  Pi: 1024 ** 5,
  Ei: 1024 ** 6
};

const DECIMAL: Record<string, number> = {
  n: 1e-9,
  u: 1e-6,
  m: 1e-3,
  "": 1,
  k: 1e3,
  K: 1e3,
  M: 1e6,
  G: 1e9,
  T: 1e12,
  P: 1e15,
  E: 1e18
};

/** Parses a Kubernetes resource quantity ("250m", "1.5", "512Mi", "1e3") to its base unit. */
export function parseQuantity(q: string | undefined): number {
  if (!q) return 0;
  const m = /^([+-]?\d*\.?\d+(?:[eE][+-]?\d+)?)([a-zA-Z]*)$/.exec(q.trim());
  if (!m) return 0;
  const n = Number.parseFloat(m[1]);
  const suffix = m[2];
  if (suffix in BINARY) return n * BINARY[suffix];
  if (suffix in DECIMAL) return n * DECIMAL[suffix];
  return 0;
}

export function cpuMillicores(q: string | undefined): number {
  return Math.round(parseQuantity(q) * 1000);
}

export function memoryMiB(q: string | undefined): number {
  return parseQuantity(q) / 1024 ** 2;
}
