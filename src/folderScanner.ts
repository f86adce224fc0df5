import fs from 'fs/promises';
import path from 'path';
import { IoError, describeError } from './errors.js';
import { ProductRow } from './types.js';
import { IMAGE_EXTENSIONS } from './validator.js';

const REQUIRED_FILES = ['title.txt', 'description.txt', 'price.txt'] as const;

export interface SkippedFolder {
  folder: string;
  reason: string;
}

export interface FolderScanResult {
  directory: string;
  rows: ProductRow[];
  skipped: SkippedFolder[];
}

async function readOptional(filePath: string): Promise<string> {
  try {
    return (await fs.readFile(filePath, 'utf-8')).trim();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return '';
    }
    throw error;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function listImages(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && IMAGE_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
    .map(entry => entry.name)
    .sort();
}

async function readProductFolder(folderPath: string, folder: string, rowNumber: number): Promise<ProductRow> {
  const imagesDir = path.join(folderPath, 'images');
  const hasImagesDir = (await isDirectory(imagesDir)) && (await listImages(imagesDir)).length > 0;
  const imagesPath = hasImagesDir
    ? imagesDir
    : (await listImages(folderPath)).map(image => path.join(folderPath, image)).join(';');

  return {
    rowNumber,
    name: await readOptional(path.join(folderPath, 'title.txt')),
    price: await readOptional(path.join(folderPath, 'price.txt')),
    description: await readOptional(path.join(folderPath, 'description.txt')),
    sku: await readOptional(path.join(folderPath, 'sku.txt')),
    stockQuantity: await readOptional(path.join(folderPath, 'stock.txt')),
    categories: await readOptional(path.join(folderPath, 'categories.txt')),
    imagesPath,
    source: folder
  };
}

/**
 * Turns a directory of product folders into product rows. Each folder holds
 * title.txt, description.txt and price.txt, optionally sku.txt, stock.txt and
 * categories.txt, and its images either in an images/ sub-folder or beside
 * the text files. A folder that cannot be read is skipped with the reason.
 */
export async function scanProductFolders(directory: string): Promise<FolderScanResult> {
  const root = path.resolve(directory);
  if (!(await isDirectory(root))) {
    throw new IoError(`Directory not found: ${root}`, root);
  }

  const entries = (await fs.readdir(root, { withFileTypes: true }))
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b));

  const rows: ProductRow[] = [];
  const skipped: SkippedFolder[] = [];

  for (const folder of entries) {
    const folderPath = path.join(root, folder);
    try {
      const names = new Set(await fs.readdir(folderPath));
      const missing = REQUIRED_FILES.filter(file => !names.has(file));
      if (missing.length > 0) {
        skipped.push({ folder, reason: `missing ${missing.join(', ')}` });
        continue;
      }
      rows.push(await readProductFolder(folderPath, folder, rows.length + 1));
    } catch (error) {
      skipped.push({ folder, reason: `unreadable: ${describeError(error)}` });
    }
  }

  return { directory: root, rows, skipped };
}
