import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Parsed contents of a JSON file, or undefined when there is no such file. */
export async function readJsonIfExists(file: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
  return JSON.parse(text);
}

// Written beside the target and renamed over it, so readers never see half a snapshot.
export async function writeJsonFile(file: string, data: unknown): Promise<void> {
  await mkdir(dirname(file), { recursive: true });
  const staging = `${file}.tmp`;
  await writeFile(staging, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
  await rename(staging, file);
}
