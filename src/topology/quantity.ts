const BINARY: Record<string, number> = { Ki: 2 ** 10, Mi: 2 ** 20, Gi: 2 ** 30, Ti: 2 ** 40 };
const DECIMAL: Record<string, number> = { K: 1e3, M: 1e6, G: 1e9, T: 1e12 };

/** "250m" → 0.25, "2" → 2 (cores). */
export function parseCpu(quantity: string): number {
  const m = /^([0-9]+)m$/.exec(quantity);
  if (m) return Number(m[1]) / 1000;
  const n = Number(quantity);
  if (!Number.isFinite(n)) throw new Error(`Invalid cpu quantity: ${quantity}`);
  return n;
}

/** "512Mi" → 536870912, "1G" → 1e9 (bytes). */
export function parseBytes(quantity: string): number {
  const m = /^([0-9]+(?:\.[0-9]+)?)(Ki|Mi|Gi|Ti|K|M|G|T)?$/.exec(quantity);
  if (!m) throw new Error(`Invalid byte quantity: ${quantity}`);
  const suffix = m[2];
  const factor = suffix ? (BINARY[suffix] ?? DECIMAL[suffix] ?? 1) : 1;
  return Number(m[1]) * factor;
}
