export type Version = readonly [number, number, number];

/** Pulls the first dotted version out of strings like "PostgreSQL 15.4 on x86_64" or "8.0.34-log". */
export function parseVersion(raw: string): Version | null {
  const m = /(\d+)(?:\.(\d+))?(?:\.(\d+))?/.exec(raw);
  if (!m) return null;
  return [Number(m[1] ?? 0), Number(m[2] ?? 0), Number(m[3] ?? 0)];
}

export function versionAtLeast(v: Version | null, min: Version): boolean {
  if (!v) return false;
  for (let i = 0; i < 3; i++) {
    const a = v[i] ?? 0;
    const b = min[i] ?? 0;
    if (a !== b) return a > b;
  }
  return true;
}
