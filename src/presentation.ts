import path from 'path';
import type { QueueSnapshotEntry, UploadStatus, ValidationResult } from './types.js';

export type DisplayTone = 'muted' | 'info' | 'success' | 'warning' | 'error';

/** One line of a terminal table; keyed by id so completion order never matters. */
export interface DisplayRow {
  key: string;
  row: number;
  name: string;
  sku: string;
  price: string;
  images: number;
  status: string;
  remoteId: string;
  detail: string;
  tone: DisplayTone;
}

export function truncateMiddle(value: string, max = 40): string {
  if (value.length <= max) {
    return value;
  }
  const keep = Math.max(1, Math.floor((max - 3) / 2));
  return `${value.slice(0, keep)}...${value.slice(-keep)}`;
}

export function describeStatus(status: UploadStatus, warningCount = 0): { label: string; tone: DisplayTone } {
  switch (status.state) {
    case 'pending':
      return { label: '⏳ Queued', tone: 'muted' };
    case 'in_progress':
      return { label: '🔄 Uploading', tone: 'info' };
    case 'succeeded':
      return warningCount > 0
        ? { label: `✅ Uploaded (${warningCount} warning${warningCount === 1 ? '' : 's'})`, tone: 'warning' }
        : { label: '✅ Uploaded', tone: 'success' };
    case 'failed':
      return { label: '❌ Failed', tone: 'error' };
  }
}

export function toDisplayRows(snapshot: readonly QueueSnapshotEntry[]): DisplayRow[] {
  return snapshot.map(entry => {
    const { label, tone } = describeStatus(entry.status, entry.warnings.length);
    const detail =
      entry.status.state === 'failed'
        ? entry.status.reason
        : entry.warnings.join('; ');
    return {
      key: entry.id,
      row: entry.record.rowNumber,
      name: truncateMiddle(entry.record.name),
      sku: entry.record.sku ?? '',
      price: entry.record.regularPrice,
      images: entry.record.imagePaths.length,
      status: label,
      remoteId: entry.status.state === 'succeeded' ? String(entry.status.remoteId) : '',
      detail,
      tone
    };
  });
}

export function validationDisplayRows(results: readonly ValidationResult[]): DisplayRow[] {
  return results.map(result => {
    if (result.kind === 'valid') {
      const record = result.record;
      const imageNote = record.imagePaths.length > 0
        ? truncateMiddle(record.imagePaths.map(image => path.basename(image)).join(', '))
        : 'no images';
      return {
        key: `row-${record.rowNumber}`,
        row: record.rowNumber,
        name: truncateMiddle(record.name),
        sku: record.sku ?? '',
        price: record.regularPrice,
        images: record.imagePaths.length,
        status: '✔ Ready',
        remoteId: '',
        detail: imageNote,
        tone: record.imagePaths.length > 0 ? 'success' : 'warning'
      };
    }
    return {
      key: `row-${result.rowNumber}`,
      row: result.rowNumber,
      name: truncateMiddle(result.row.name || '(no name)'),
      sku: result.row.sku,
      price: result.row.price,
      images: 0,
      status: '⚠️ Invalid',
      remoteId: '',
      detail: result.errors.map(error => error.message).join('; '),
      tone: 'error'
    };
  });
}
