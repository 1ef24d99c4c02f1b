import path from 'path';
import { DESIGN_SPECS_FILE } from '../outputService';

export type CliArgs = { input: string | null; out: string; tree: string | null };

export function parseArgs(argv: string[]): CliArgs {
  let input: string | null = null;
  let out = path.join('output_files', DESIGN_SPECS_FILE);
  let tree: string | null = null;

  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (a === '--out' || a === '-o' || a === '--tree' || a === '-t') {
      const v = argv[i + 1];
      if (v && !v.startsWith('-')) {
        if (a === '--out' || a === '-o') out = v; else tree = v;
        i++;
      }
      continue;
    }
    if (!input) input = a;
  }

  return { input, out, tree };
}
