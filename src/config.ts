import fs from 'fs';
import path from 'path';
import { isLevel, type Level } from './utils/logger';

export interface ServerConfig {
  port: number;
  /** '*' reflects any origin */
  corsOrigins: '*' | string[];
  /** Where design_specs.json is written after each conversion; null disables it. */
  outputDir: string | null;
  fetchTimeoutMs: number;
  bodyLimit: string;
  logLevel: Level;
  logDir: string;
}

/**
 * Load KEY=VALUE lines from <cwd>/.env into env without overriding what is already set.
 */
export function loadEnvFile(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) return;
  const contents = fs.readFileSync(envPath, 'utf8');
  contents.split(/\r?\n/).forEach(line => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    const eq = trimmed.indexOf('=');
    if (eq <= 0) return;
    const key = trimmed.slice(0, eq).trim();
    const value = trimmed.slice(eq + 1).trim();
    if (!env[key]) {
      env[key] = value;
    }
  });
}

function positiveInt(raw: string | undefined, name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0 || n > max) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return n;
}

function parseOrigins(raw: string | undefined): '*' | string[] {
  const value = (raw || '').trim();
  if (!value || value === '*') return '*';
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): ServerConfig {
  const level = String(env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLevel(level)) throw new Error(`invalid LOG_LEVEL: ${env.LOG_LEVEL}`);

  const outputRaw = (env.OUTPUT_DIR || 'output_files').trim();
  const outputDir = ['off', 'false', 'none'].includes(outputRaw.toLowerCase()) ? null : path.resolve(cwd, outputRaw);

  return {
    port: positiveInt(env.PORT, 'PORT', 5000, 65535),
    corsOrigins: parseOrigins(env.CORS_ORIGIN),
    outputDir,
    fetchTimeoutMs: positiveInt(env.FETCH_TIMEOUT_MS, 'FETCH_TIMEOUT_MS', 15000),
    bodyLimit: (env.BODY_LIMIT || '25mb').trim(),
    logLevel: level,
    logDir: path.resolve(cwd, env.LOG_DIR || path.join('debug', 'logs')),
  };
}
