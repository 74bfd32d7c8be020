import fs from 'node:fs';
import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

// Removes `dir` with everything in it, then creates it empty.
export function resetDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
  ensureDir(dir);
}

export function writeJson(filePath: string, data: unknown, indent = 4) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, indent), 'utf-8');
}

export async function writeBytes(filePath: string, data: Uint8Array): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, data);
}
