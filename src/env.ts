import fs from 'fs/promises';
import path from 'path';

/**
 * Copies `KEY=value` pairs from a .env file into `target`. Variables that are
 * already set are left alone. Returns the keys that were applied.
 */
export async function loadDotEnv(
  envPath: string = path.join(process.cwd(), '.env'),
  target: NodeJS.ProcessEnv = process.env
): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(envPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }

  const applied: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    const idx = trimmed.indexOf('=');
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).replace(/^export\s+/, '').trim();
    let value = trimmed.slice(idx + 1).trim();
    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (!target[key]) {
      target[key] = value;
      applied.push(key);
    }
  }
  return applied;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
