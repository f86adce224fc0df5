import fs from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import { describeError } from './errors.js';
import { FieldError, ProductRecord, ProductRow, ValidationResult } from './types.js';

export const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp', '.tiff', '.tif']);

export interface ValidateOptions {
  /** Directory that relative image paths resolve against. */
  baseDir?: string;
}

export interface ValidationSummary {
  total: number;
  valid: number;
  invalid: number;
  withImages: number;
  withoutImages: number;
  totalImages: number;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

const PRICE_PATTERN = /^\d+(\.\d+)?$/;
const INTEGER_PATTERN = /^\d+$/;
export const MAX_PRICE = 1_000_000_000;

export function parsePrice(raw: string): Parsed<number> {
  const cleaned = raw.trim().replace(/^[$€£]\s*/, '').replace(/,(?=\d{3}(\D|$))/g, '');
  if (!cleaned) {
    return { ok: false, message: 'price is required' };
  }
  if (cleaned.startsWith('-') && PRICE_PATTERN.test(cleaned.slice(1))) {
    return { ok: false, message: `price must not be negative (got "${raw.trim()}")` };
  }
  if (!PRICE_PATTERN.test(cleaned)) {
    return { ok: false, message: `price must be a number (got "${raw.trim()}")` };
  }
  const value = Number(cleaned);
  if (value >= MAX_PRICE) {
    return { ok: false, message: `price is too large (got "${raw.trim()}")` };
  }
  return { ok: true, value };
}

export function parseStockQuantity(raw: string): Parsed<number> {
  const trimmed = raw.trim();
  if (!trimmed) {
    return { ok: true, value: 0 };
  }
  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, message: `stock_quantity must be a whole number >= 0 (got "${trimmed}")` };
  }
  return { ok: true, value: Number.parseInt(trimmed, 10) };
}

export function splitList(raw: string): string[] {
  return raw
    .split(/[;,]/)
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

function isImageFile(filePath: string): boolean {
  return IMAGE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

async function collectImages(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const found: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await collectImages(fullPath)));
    } else if (entry.isFile() && isImageFile(entry.name)) {
      found.push(fullPath);
    }
  }
  return found.sort();
}

async function expandPattern(pattern: string, baseDir: string): Promise<Parsed<string[]>> {
  let matches: string[];
  try {
    matches = await fg(pattern, { cwd: baseDir, absolute: true, onlyFiles: true });
  } catch (error) {
    return { ok: false, message: `image pattern failed: ${pattern} (${describeError(error)})` };
  }
  const images = matches.filter(isImageFile).map(match => path.normalize(match)).sort();
  if (images.length === 0) {
    return { ok: false, message: `no images match pattern: ${pattern}` };
  }
  return { ok: true, value: images };
}

/**
 * Expands one images_path entry (a file, a folder or a glob pattern such as
 * `photos/mug*.jpg`) into readable image files, or explains why it cannot be
 * used.
 */
async function resolveImageEntry(entry: string, baseDir: string): Promise<Parsed<string[]>> {
  const fullPath = path.resolve(baseDir, entry);
  let isDirectory: boolean;
  try {
    const stat = await fs.stat(fullPath);
    isDirectory = stat.isDirectory();
    await fs.access(fullPath, fs.constants.R_OK);
  } catch {
    if (fg.isDynamicPattern(entry)) {
      return expandPattern(entry, baseDir);
    }
    return { ok: false, message: `image not found or unreadable: ${entry}` };
  }

  if (!isDirectory) {
    if (!isImageFile(fullPath)) {
      return { ok: false, message: `not an image file: ${entry}` };
    }
    return { ok: true, value: [fullPath] };
  }

  let images: string[];
  try {
    images = await collectImages(fullPath);
  } catch (error) {
    return { ok: false, message: `image folder unreadable: ${entry} (${describeError(error)})` };
  }
  if (images.length === 0) {
    return { ok: false, message: `no images found in folder: ${entry}` };
  }
  return { ok: true, value: images };
}

async function validateRow(row: ProductRow, baseDir: string): Promise<ValidationResult> {
  const errors: FieldError[] = [];

  const name = row.name.trim();
  if (!name) {
    errors.push({ column: 'name', message: 'name is required' });
  }

  const price = parsePrice(row.price);
  if (!price.ok) {
    errors.push({ column: 'price', message: price.message });
  }

  const stock = parseStockQuantity(row.stockQuantity);
  if (!stock.ok) {
    errors.push({ column: 'stock_quantity', message: stock.message });
  }

  const imagePaths: string[] = [];
  for (const entry of splitList(row.imagesPath)) {
    const resolved = await resolveImageEntry(entry, baseDir);
    if (resolved.ok) {
      imagePaths.push(...resolved.value.filter(image => !imagePaths.includes(image)));
    } else {
      errors.push({ column: 'images_path', message: resolved.message });
    }
  }

  if (errors.length > 0 || !price.ok || !stock.ok) {
    return { kind: 'invalid', rowNumber: row.rowNumber, row, errors };
  }

  const sku = row.sku.trim();
  const record: ProductRecord = Object.freeze({
    rowNumber: row.rowNumber,
    name,
    price: price.value,
    regularPrice: price.value.toFixed(2),
    categories: Object.freeze(splitList(row.categories)),
    description: row.description.trim(),
    stockQuantity: stock.value,
    sku: sku || undefined,
    imagePaths: Object.freeze(imagePaths),
    source: row.source
  });

  return { kind: 'valid', record };
}

/**
 * Validates every row independently and in order. Problems are collected per
 * row; a bad row never stops the rows after it.
 */
export async function validateRows(
  rows: readonly ProductRow[],
  options: ValidateOptions = {}
): Promise<ValidationResult[]> {
  const baseDir = options.baseDir ?? process.cwd();
  const results: ValidationResult[] = [];
  for (const row of rows) {
    results.push(await validateRow(row, baseDir));
  }
  return results;
}

export function validRecords(results: readonly ValidationResult[]): ProductRecord[] {
  return results.flatMap(result => (result.kind === 'valid' ? [result.record] : []));
}

export function summarizeValidation(results: readonly ValidationResult[]): ValidationSummary {
  const records = validRecords(results);
  const withImages = records.filter(record => record.imagePaths.length > 0).length;
  return {
    total: results.length,
    valid: records.length,
    invalid: results.length - records.length,
    withImages,
    withoutImages: records.length - withImages,
    totalImages: records.reduce((sum, record) => sum + record.imagePaths.length, 0)
  };
}
