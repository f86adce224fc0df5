import path from 'path';
import fs from 'fs/promises';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { generateTemplate } from '../src/templateGenerator.js';
import { readProductSheet } from '../src/spreadsheetReader.js';
import { IoError } from '../src/errors.js';
import { TEMPLATE_COLUMNS } from '../src/types.js';
import { makeTempDir } from './helpers.js';

describe('generateTemplate', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('writes a workbook whose header matches the reader columns', async () => {
    const destination = path.join(tempDir, 'template.xlsx');

    const written = await generateTemplate(destination);
    const sheet = await readProductSheet(written);

    expect(written).toBe(destination);
    expect(sheet.sheetName).toBe('Products');
    expect(sheet.columns).toEqual([...TEMPLATE_COLUMNS]);
    expect(sheet.rows).toEqual([]);
  });

  it('adds an instructions sheet describing every column', async () => {
    const destination = path.join(tempDir, 'template.xlsx');
    await generateTemplate(destination);

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(destination);
    const instructions = workbook.getWorksheet('Instructions');

    expect(instructions?.getRow(1).getCell(1).text).toBe('Column');
    expect(instructions?.getRow(2).getCell(1).text).toBe('name');
    expect(instructions?.getRow(2).getCell(2).text).toBe('Yes');
    expect(instructions?.getRow(4).getCell(2).text).toBe('No');
    expect(instructions?.actualRowCount).toBe(TEMPLATE_COLUMNS.length + 1);
  });

  it('includes example rows on request', async () => {
    const written = await generateTemplate(path.join(tempDir, 'examples.xlsx'), { withExamples: true });
    const sheet = await readProductSheet(written);

    expect(sheet.rows.map(row => row.name)).toEqual(['Ceramic Mug', 'Linen Tea Towel']);
    expect(sheet.rows[0]).toMatchObject({ rowNumber: 2, price: '9.99', stockQuantity: '10', sku: 'MUG-001' });
  });

  it('writes a csv template when the destination ends in .csv', async () => {
    const written = await generateTemplate(path.join(tempDir, 'template.csv'));
    const content = await fs.readFile(written, 'utf-8');

    expect(content.split(/\r?\n/)[0]).toBe('name,price,categories,description,stock_quantity,sku,images_path');
  });

  it('overwrites an existing template by default and leaves no temp files', async () => {
    const destination = path.join(tempDir, 'template.xlsx');
    await fs.writeFile(destination, 'stale');

    await generateTemplate(destination);
    await generateTemplate(destination);

    expect(await fs.readdir(tempDir)).toEqual(['template.xlsx']);
    const sheet = await readProductSheet(destination);
    expect(sheet.columns).toEqual([...TEMPLATE_COLUMNS]);
  });

  it('refuses to replace an existing file when overwrite is off', async () => {
    const destination = path.join(tempDir, 'template.xlsx');
    await fs.writeFile(destination, 'keep me');

    await expect(generateTemplate(destination, { overwrite: false })).rejects.toBeInstanceOf(IoError);
    expect(await fs.readFile(destination, 'utf-8')).toBe('keep me');
  });

  it('reports an unwritable destination as an io error', async () => {
    const destination = path.join(tempDir, 'missing-dir', 'template.xlsx');

    await expect(generateTemplate(destination)).rejects.toBeInstanceOf(IoError);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
