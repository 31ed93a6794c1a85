import { readFile, writeFile } from 'fs/promises';

/**
 * Read a newline-delimited list (identifiers or URLs), ignoring blank lines
 */
export async function readLines(path: string): Promise<string[]> {
  const content = await readFile(path, 'utf-8');
  return parseLines(content);
}

export function parseLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export async function writeLines(path: string, lines: Iterable<string>): Promise<void> {
  const body = [...lines].join('\n');
  await writeFile(path, body.length > 0 ? `${body}\n` : '', 'utf-8');
}
