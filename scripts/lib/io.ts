import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';

export function toPosixRelative(filePath: string): string {
  const relative = path.relative(process.cwd(), filePath);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return filePath.split(path.sep).join('/');
  }
  return relative.split(path.sep).join('/');
}

export async function directoryExists(dirPath: string): Promise<boolean> {
  if (!(await fs.pathExists(dirPath))) {
    return false;
  }
  const stat = await fs.stat(dirPath);
  return stat.isDirectory();
}

export async function readTextFile(filePath: string, label = 'File'): Promise<string> {
  if (!(await fs.pathExists(filePath))) {
    throw new Error(`${label} '${toPosixRelative(filePath)}' doesn't exist`);
  }
  return fs.readFile(filePath, 'utf8');
}

/** Markdown files directly inside `folder`, absolute and sorted. */
export async function listMarkdownFiles(folder: string): Promise<string[]> {
  if (!(await directoryExists(folder))) {
    throw new Error(`Folder '${toPosixRelative(folder)}' doesn't exist`);
  }

  const files = await fg('*.md', {
    cwd: folder,
    absolute: true,
    onlyFiles: true,
    dot: false,
    deep: 1
  });

  return files.map((file) => path.normalize(file)).sort((a, b) => a.localeCompare(b));
}

/** Every file named `fileName` anywhere below `root`, absolute and sorted. */
export async function findFilesNamed(root: string, fileName: string): Promise<string[]> {
  const files = await fg(`**/${fg.escapePath(fileName)}`, {
    cwd: root,
    absolute: true,
    onlyFiles: true,
    dot: false
  });

  return files.map((file) => path.normalize(file)).sort((a, b) => a.localeCompare(b));
}
