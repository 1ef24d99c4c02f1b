// Small CSS text helpers used by the node transformer.
// Keep them pure and reusable across modules.

/**
 * Split a declaration list on ';', ignoring separators inside parentheses or quotes
 * (e.g. url(data:image/png;base64,...)).
 */
export function splitDeclarations(s: string): string[] {
  const out: string[] = [];
  if (!s) return out;
  let cur = '';
  let depth = 0;
  let quote: string | null = null;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (quote) {
      cur += ch;
      if (ch === quote && s[i - 1] !== '\\') quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") { quote = ch; cur += ch; continue; }
    if (ch === '(') { depth++; cur += ch; continue; }
    if (ch === ')') { depth = Math.max(0, depth - 1); cur += ch; continue; }
    if (ch === ';' && depth === 0) { if (cur.trim()) out.push(cur.trim()); cur = ''; continue; }
    cur += ch;
  }
  if (cur.trim()) out.push(cur.trim());
  return out;
}

/**
 * Parse an inline `style` attribute into property => value.
 * Properties are lower-cased, `!important` is dropped and the last declaration wins.
 */
export function parseInlineStyle(css: string): Record<string, string> {
  const map: Record<string, string> = {};
  for (const decl of splitDeclarations(css)) {
    const idx = decl.indexOf(':');
    if (idx <= 0) continue;
    const k = decl.slice(0, idx).trim().toLowerCase();
    const v = decl.slice(idx + 1).replace(/\s*!important\s*$/i, '').trim();
    if (!k || !v) continue;
    map[k] = v;
  }
  return map;
}

/** Class attribute tokens, split on whitespace the way the DOM's classList does. */
export function splitClassTokens(s: string): string[] {
  return s.split(/\s+/).filter(Boolean);
}
