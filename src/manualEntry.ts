import { ProductRow } from './types.js';

export const MANUAL_SOURCE = 'manual entry';

export interface ManualProductInput {
  name: string;
  price: string;
  description?: string;
  sku?: string;
  categories?: readonly string[];
  stockQuantity?: string;
  imagePaths?: readonly string[];
}

/** Shapes a hand-entered product like a spreadsheet row so it validates the same way. */
export function buildManualRow(input: ManualProductInput, rowNumber = 1): ProductRow {
  return {
    rowNumber,
    name: input.name,
    price: input.price,
    categories: (input.categories ?? []).join(';'),
    description: input.description ?? '',
    stockQuantity: input.stockQuantity ?? '',
    sku: input.sku ?? '',
    imagesPath: (input.imagePaths ?? []).join(';'),
    source: MANUAL_SOURCE
  };
}

export function addImagePaths(current: readonly string[], entries: readonly string[]): string[] {
  const next = [...current];
  for (const entry of entries) {
    const trimmed = entry.trim();
    if (trimmed && !next.includes(trimmed)) {
      next.push(trimmed);
    }
  }
  return next;
}

/** Moves one image to a new position; out-of-range indexes leave the order alone. */
export function moveImage(images: readonly string[], from: number, to: number): string[] {
  const next = [...images];
  if (from < 0 || from >= next.length || to < 0 || to >= next.length || from === to) {
    return next;
  }
  const [moved] = next.splice(from, 1);
  next.splice(to, 0, moved);
  return next;
}

export function removeImage(images: readonly string[], index: number): string[] {
  return images.filter((_, position) => position !== index);
}
