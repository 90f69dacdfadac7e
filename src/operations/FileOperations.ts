import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { mkdir, readdir, readFile, stat, writeFile } from 'fs/promises';
import path from 'path';
import { defineOperation } from '../core/workflow/Operation';
import type { Operation } from '../core/workflow/Operation';
import { toJsonSafe } from '../core/workflow/Feedback';

export interface FileManifestEntry {
  name: string; // relative to the listed directory, `/`-separated
  size: number;
  md5: string;
}

function requireString(args: Record<string, unknown>, key: string, operation: string): string {
  const value = args[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new TypeError(`Operation "${operation}" expects "${key}" to be a non-empty string, got ${typeof value}.`);
  }
  return value;
}

export function md5File(filename: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    createReadStream(filename)
      .on('data', chunk => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

async function collectFiles(root: string, dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const absolute = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectFiles(root, absolute, out);
    } else if (entry.isFile()) {
      out.push(path.relative(root, absolute));
    }
  }
}

/**
 * Lists every regular file below `directory` with its size and md5 checksum, sorted by name.
 */
export async function buildFileManifest(directory: string): Promise<FileManifestEntry[]> {
  const relativeNames: string[] = [];
  await collectFiles(directory, directory, relativeNames);

  const manifest: FileManifestEntry[] = [];
  for (const relative of relativeNames) {
    const absolute = path.join(directory, relative);
    const info = await stat(absolute);
    manifest.push({
      name: relative.split(path.sep).join('/'),
      size: info.size,
      md5: await md5File(absolute),
    });
  }
  return manifest.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export const fileManifest: Operation = defineOperation(
  'file_manifest',
  ['directory'],
  args => buildFileManifest(requireString(args, 'directory', 'file_manifest')),
  'List files below a directory with size and md5 checksum.'
);

export const writeJsonFile: Operation = defineOperation(
  'write_json_file',
  ['directory', 'file_name', 'data'],
  async args => {
    const directory = requireString(args, 'directory', 'write_json_file');
    const fileName = requireString(args, 'file_name', 'write_json_file');
    const target = path.join(directory, fileName);
    if (path.relative(directory, target).startsWith('..')) {
      throw new Error(`Operation "write_json_file" refuses to write outside "${directory}": ${fileName}`);
    }
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(toJsonSafe(args.data), null, 2) + '\n', 'utf-8');
    return target;
  },
  'Write data as pretty-printed JSON and return the file path.'
);

export const readJsonFile: Operation = defineOperation(
  'read_json_file',
  ['path'],
  async args => {
    const filename = requireString(args, 'path', 'read_json_file');
    const text = await readFile(filename, 'utf-8');
    const data: unknown = JSON.parse(text);
    return data;
  },
  'Read and parse a JSON file.'
);

export const fileOperations: Operation[] = [fileManifest, writeJsonFile, readJsonFile];
