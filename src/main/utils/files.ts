import fs from 'fs-extra';
import path from 'node:path';

export const TEMP_SUFFIX = '.out.mp3';

export const tempOutputPath = (audioPath: string): string => `${audioPath}${TEMP_SUFFIX}`;

export const isFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
};

export const isDirectory = async (dirPath: string): Promise<boolean> => {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
};

export const listFiles = async (root: string): Promise<string[]> => {
  const entries = await fs.readdir(root, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile() || (entry.isSymbolicLink() && (await isFile(fullPath)))) {
      files.push(fullPath);
    }
  }
  return files;
};

export const replaceExtension = (filePath: string, ext: string): string => {
  const { dir, name } = path.parse(filePath);
  return path.join(dir, `${name}${ext.startsWith('.') ? ext : `.${ext}`}`);
};
