import { describe, expect, it } from 'vitest';
import { describeStatus, toDisplayRows, truncateMiddle, validationDisplayRows } from '../src/presentation.js';
import { UploadQueue } from '../src/uploadQueue.js';
import type { ValidationResult } from '../src/types.js';
import { makeRecord } from './helpers.js';

describe('truncateMiddle', () => {
  it('keeps both ends of long values', () => {
    expect(truncateMiddle('abcdefghijklmnopqrstuvwxyz', 10)).toBe('abc...xyz');
    expect(truncateMiddle('short', 10)).toBe('short');
  });
});

describe('describeStatus', () => {
  it('labels each state', () => {
    expect(describeStatus({ state: 'pending' })).toEqual({ label: '⏳ Queued', tone: 'muted' });
    expect(describeStatus({ state: 'in_progress', startedAt: new Date() })).toEqual({ label: '🔄 Uploading', tone: 'info' });
    expect(describeStatus({ state: 'succeeded', remoteId: 4, completedAt: new Date() })).toEqual({
      label: '✅ Uploaded',
      tone: 'success'
    });
    expect(describeStatus({ state: 'succeeded', remoteId: 4, completedAt: new Date() }, 2)).toEqual({
      label: '✅ Uploaded (2 warnings)',
      tone: 'warning'
    });
    expect(
      describeStatus({ state: 'failed', reason: 'x', kind: 'network', completedAt: new Date() })
    ).toEqual({ label: '❌ Failed', tone: 'error' });
  });
});

describe('toDisplayRows', () => {
  it('keys rows by queue item and shows outcome details', () => {
    const queue = new UploadQueue();
    queue.enqueue([
      makeRecord('Mug', { rowNumber: 2, sku: 'MUG-1', regularPrice: '9.99' }),
      makeRecord('Lamp', { rowNumber: 3 }),
      makeRecord('Towel', { rowNumber: 4 })
    ]);
    queue.nextPending();
    queue.nextPending();
    queue.markFailed('item-2', 'HTTP 400 - bad price', 'rejected');
    queue.addWarning('item-1', 'image a.jpg: too large');
    queue.markSucceeded('item-1', 77);

    const rows = toDisplayRows(queue.snapshot());

    expect(rows).toEqual([
      {
        key: 'item-1',
        row: 2,
        name: 'Mug',
        sku: 'MUG-1',
        price: '9.99',
        images: 0,
        status: '✅ Uploaded (1 warning)',
        remoteId: '77',
        detail: 'image a.jpg: too large',
        tone: 'warning'
      },
      {
        key: 'item-2',
        row: 3,
        name: 'Lamp',
        sku: '',
        price: '10.00',
        images: 0,
        status: '❌ Failed',
        remoteId: '',
        detail: 'HTTP 400 - bad price',
        tone: 'error'
      },
      {
        key: 'item-3',
        row: 4,
        name: 'Towel',
        sku: '',
        price: '10.00',
        images: 0,
        status: '⏳ Queued',
        remoteId: '',
        detail: '',
        tone: 'muted'
      }
    ]);
  });
});

describe('validationDisplayRows', () => {
  it('shows ready rows and joins the problems of invalid ones', () => {
    const results: ValidationResult[] = [
      { kind: 'valid', record: makeRecord('Mug', { imagePaths: ['/photos/mug/front.jpg', '/photos/mug/back.jpg'] }) },
      {
        kind: 'invalid',
        rowNumber: 3,
        row: {
          rowNumber: 3,
          name: '',
          price: 'abc',
          categories: '',
          description: '',
          stockQuantity: '',
          sku: 'X-1',
          imagesPath: ''
        },
        errors: [
          { column: 'name', message: 'name is required' },
          { column: 'price', message: 'price must be a number (got "abc")' }
        ]
      }
    ];

    const [ready, invalid] = validationDisplayRows(results);

    expect(ready).toMatchObject({ status: '✔ Ready', images: 2, detail: 'front.jpg, back.jpg', tone: 'success' });
    expect(invalid).toMatchObject({
      key: 'row-3',
      name: '(no name)',
      sku: 'X-1',
      price: 'abc',
      status: '⚠️ Invalid',
      detail: 'name is required; price must be a number (got "abc")',
      tone: 'error'
    });
  });
});
