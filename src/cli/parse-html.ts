/*
 Convert a local HTML file or a URL into design specs without starting the server.
 Usage: npm run parse-html -- <file|url> [--out output_files/design_specs.json] [--tree output_files/parsed_html.txt]
*/

import fs from 'fs';
import path from 'path';
import { parseHtml, toDesignJson, formatDesignTree } from 'design-spec-pipeline';
import { fetchHtml } from '../fetchService';
import { writeJsonFile, writeTextFile } from '../outputService';
import { parseArgs } from './args';

function isUrl(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

async function readInput(input: string): Promise<string> {
  if (isUrl(input)) return fetchHtml(input);
  const full = path.isAbsolute(input) ? input : path.join(process.cwd(), input);
  return fs.readFileSync(full, 'utf8');
}

async function main() {
  const args = parseArgs(process.argv);
  if (!args.input) {
    console.error('Usage: npm run parse-html -- <file|url> [--out path] [--tree path]');
    process.exit(1);
  }

  const html = await readInput(args.input);
  const tree = parseHtml(html, {
    warn: (message, meta) => console.warn(`warning: ${message}`, meta ?? ''),
  });

  writeJsonFile(args.out, toDesignJson(tree));
  console.log(`Framework: ${tree.framework}`);
  console.log(`Design specs written to ${args.out}`);
  if (args.tree) {
    writeTextFile(args.tree, formatDesignTree(tree) + '\n');
    console.log(`Tree dump written to ${args.tree}`);
  }
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
