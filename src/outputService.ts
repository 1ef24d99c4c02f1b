import fs from 'fs';
import path from 'path';
import type { DesignNodeJson } from 'design-spec-pipeline';

export const DESIGN_SPECS_FILE = 'design_specs.json';

export function writeJsonFile(file: string, data: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(data, null, 2), 'utf8');
}

export function writeTextFile(file: string, text: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, text, 'utf8');
}

/** Overwrites <dir>/design_specs.json with the latest conversion and returns its path. */
export function writeDesignSpecs(dir: string, json: DesignNodeJson): string {
  const file = path.join(dir, DESIGN_SPECS_FILE);
  writeJsonFile(file, json);
  return file;
}
