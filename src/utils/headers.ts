// src/utils/headers.ts

/**
 * Merge header maps left to right. Names compare case-insensitively;
 * a later layer replaces an earlier value and its spelling.
 */
export function mergeHeaders(...layers: Array<Record<string, string> | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  const names = new Map<string, string>(); // lower-case -> spelling in `out`

  for (const layer of layers) {
    if (!layer) continue;
    for (const [name, value] of Object.entries(layer)) {
      const lower = name.toLowerCase();
      const prev = names.get(lower);
      if (prev !== undefined) delete out[prev];
      out[name] = value;
      names.set(lower, name);
    }
  }
  return out;
}
