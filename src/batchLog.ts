import fs from 'fs/promises';
import path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { IoError, describeError } from './errors.js';
import type { QueueSnapshotEntry } from './types.js';

export interface BatchLogOptions {
  directory: string;
  batchId: string;
  defaultCategoryId?: number;
  source?: string;
  now?: Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** Local timestamp in the form 20240131_174502. */
export function createBatchId(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function statusFields(entry: QueueSnapshotEntry): { status: string; remoteId: number | null; reason: string | null } {
  switch (entry.status.state) {
    case 'succeeded':
      return { status: 'succeeded', remoteId: entry.status.remoteId, reason: null };
    case 'failed':
      return { status: 'failed', remoteId: null, reason: entry.status.reason };
    default:
      return { status: entry.status.state, remoteId: null, reason: null };
  }
}

/**
 * Writes a JSON record of a batch run: totals plus one entry per item.
 */
export async function writeBatchLog(snapshot: readonly QueueSnapshotEntry[], options: BatchLogOptions): Promise<string> {
  const timestamp = createBatchId(options.now);
  const filePath = path.join(options.directory, `batch_${options.batchId}_${timestamp}.json`);

  const products = snapshot.map(entry => ({
    id: entry.id,
    row: entry.record.rowNumber,
    name: entry.record.name,
    sku: entry.record.sku ?? null,
    price: entry.record.regularPrice,
    images: entry.record.imagePaths.length,
    attempts: entry.attempts,
    warnings: entry.warnings,
    ...statusFields(entry)
  }));

  const log = {
    batch_id: options.batchId,
    timestamp,
    source: options.source ?? null,
    category_id: options.defaultCategoryId ?? null,
    total_products: snapshot.length,
    succeeded: products.filter(product => product.status === 'succeeded').length,
    failed: products.filter(product => product.status === 'failed').length,
    products
  };

  try {
    await fs.mkdir(options.directory, { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(log, null, 2), 'utf-8');
  } catch (error) {
    throw new IoError(`Failed to write batch log ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
  return filePath;
}

export async function exportResultsCsv(snapshot: readonly QueueSnapshotEntry[], filePath: string): Promise<number> {
  const writer = createObjectCsvWriter({
    path: filePath,
    header: [
      { id: 'row', title: 'Row' },
      { id: 'name', title: 'Name' },
      { id: 'sku', title: 'SKU' },
      { id: 'price', title: 'Price' },
      { id: 'images', title: 'Images' },
      { id: 'status', title: 'Status' },
      { id: 'remoteId', title: 'Remote ID' },
      { id: 'details', title: 'Details' }
    ]
  });

  const records = snapshot.map(entry => {
    const fields = statusFields(entry);
    return {
      row: entry.record.rowNumber,
      name: entry.record.name,
      sku: entry.record.sku ?? '',
      price: entry.record.regularPrice,
      images: entry.record.imagePaths.length,
      status: fields.status,
      remoteId: fields.remoteId ?? '',
      details: fields.reason ?? entry.warnings.join('; ')
    };
  });

  try {
    await writer.writeRecords(records);
  } catch (error) {
    throw new IoError(`Failed to export results to ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
  return records.length;
}
