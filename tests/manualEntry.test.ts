import path from 'path';
import fs from 'fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { MANUAL_SOURCE, addImagePaths, buildManualRow, moveImage, removeImage } from '../src/manualEntry.js';
import { validateRows } from '../src/validator.js';
import { makeTempDir, writeFile } from './helpers.js';

describe('image ordering', () => {
  it('adds trimmed paths once', () => {
    expect(addImagePaths(['a.jpg'], [' b.jpg ', 'a.jpg', '', 'c.jpg'])).toEqual(['a.jpg', 'b.jpg', 'c.jpg']);
  });

  it('moves an image up or down', () => {
    expect(moveImage(['a', 'b', 'c'], 2, 0)).toEqual(['c', 'a', 'b']);
    expect(moveImage(['a', 'b', 'c'], 0, 1)).toEqual(['b', 'a', 'c']);
  });

  it('ignores moves past either end', () => {
    expect(moveImage(['a', 'b'], 0, -1)).toEqual(['a', 'b']);
    expect(moveImage(['a', 'b'], 1, 2)).toEqual(['a', 'b']);
  });

  it('removes by position', () => {
    expect(removeImage(['a', 'b', 'c'], 1)).toEqual(['a', 'c']);
  });
});

describe('buildManualRow', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('fills unset fields with blanks', () => {
    expect(buildManualRow({ name: 'Mug', price: '9.99' })).toEqual({
      rowNumber: 1,
      name: 'Mug',
      price: '9.99',
      categories: '',
      description: '',
      stockQuantity: '',
      sku: '',
      imagesPath: '',
      source: MANUAL_SOURCE
    });
  });

  it('validates into a record that keeps the chosen image order', async () => {
    await writeFile(path.join(tempDir, 'front.jpg'), 'front');
    await writeFile(path.join(tempDir, 'back.jpg'), 'back');
    const images = moveImage(addImagePaths([], ['front.jpg', 'back.jpg']), 1, 0);

    const [result] = await validateRows(
      [
        buildManualRow({
          name: ' Ceramic Mug ',
          price: '12.5',
          description: 'Stoneware',
          sku: 'MUG-1',
          categories: ['Kitchen', 'Gifts'],
          stockQuantity: '3',
          imagePaths: images
        })
      ],
      { baseDir: tempDir }
    );

    expect(result).toMatchObject({
      kind: 'valid',
      record: {
        rowNumber: 1,
        name: 'Ceramic Mug',
        regularPrice: '12.50',
        categories: ['Kitchen', 'Gifts'],
        stockQuantity: 3,
        sku: 'MUG-1',
        imagePaths: [path.join(tempDir, 'back.jpg'), path.join(tempDir, 'front.jpg')],
        source: MANUAL_SOURCE
      }
    });
  });

  it('reports a missing price like a sheet row', async () => {
    const [result] = await validateRows([buildManualRow({ name: 'Mug', price: ' ' })], { baseDir: tempDir });

    expect(result).toMatchObject({ kind: 'invalid', errors: [{ column: 'price', message: 'price is required' }] });
  });
});
