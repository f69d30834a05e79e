/**
 * File helpers shared by the cookie loader, video lists and outputs
 */

import { access, appendFile, constants, readFile, writeFile } from 'node:fs/promises';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readTextFile(path: string): Promise<string> {
  return readFile(path, 'utf-8');
}

/**
 * Read the meaningful lines of a text file: trimmed, without blanks
 * and without `#` comments
 */
export async function readLines(path: string): Promise<string[]> {
  const text = await readTextFile(path);
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

/**
 * Write content to file (overwrites existing)
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8');
}

export async function appendTextFile(path: string, content: string): Promise<void> {
  await appendFile(path, content, 'utf-8');
}
