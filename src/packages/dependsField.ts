/**
 * Parses a Debian relationship field (Depends, Pre-Depends) into groups of
 * alternative package names:
 *
 *   "libc6 (>= 2.34), debconf (>= 0.5) | debconf-2.0, perl:any"
 *   -> [["libc6"], ["debconf", "debconf-2.0"], ["perl"]]
 */
export function parseDependsField(value: string | undefined): string[][] {
  if (!value) return [];

  const groups: string[][] = [];
  for (const rawGroup of value.split(',')) {
    const alternatives: string[] = [];
    for (const rawAlt of rawGroup.split('|')) {
      const name = parseAlternativeName(rawAlt);
      if (name && !alternatives.includes(name)) alternatives.push(name);
    }
    if (alternatives.length > 0) groups.push(alternatives);
  }
  return groups;
}

function parseAlternativeName(raw: string): string | null {
  const stripped = raw
    .replace(/\([^)]*\)/gu, ' ')
    .replace(/\[[^\]]*\]/gu, ' ')
    .replace(/<[^>]*>/gu, ' ')
    .trim();
  const token = stripped.split(/\s+/u)[0] ?? '';
  const colon = token.indexOf(':');
  const name = colon === -1 ? token : token.slice(0, colon);
  return name.length > 0 ? name : null;
}
