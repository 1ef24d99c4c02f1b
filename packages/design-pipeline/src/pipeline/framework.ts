import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Framework } from '../types/design';
import { splitClassTokens } from '../utils/css-parser';

// bg-gray-100, text-blue-500, border-slate-200 ...
const TAILWIND_PALETTE_CLASS_RE = /^(bg|text|border)-[a-z]+-\d{3}$/;

function anyAttrContains($: CheerioAPI, selector: string, attr: string, needle: string): boolean {
  return $<Element, string>(selector)
    .toArray()
    .some(el => (el.attribs[attr] || '').includes(needle));
}

/**
 * Classify the whole document once. Bootstrap is checked first and wins when both signal.
 */
export function detectFramework($: CheerioAPI): Framework {
  if (anyAttrContains($, 'link[href]', 'href', 'bootstrap')) return 'bootstrap';

  if (anyAttrContains($, 'script[src]', 'src', 'tailwind')) return 'tailwind';
  const hasPaletteClass = $('[class]')
    .toArray()
    .some(el => splitClassTokens(el.attribs.class || '').some(cls => TAILWIND_PALETTE_CLASS_RE.test(cls)));
  if (hasPaletteClass) return 'tailwind';

  return 'none';
}
