import fs from 'fs/promises';
import path from 'path';
import ExcelJS, { type Workbook } from 'exceljs';
import { IoError, describeError } from './errors.js';
import { TEMPLATE_COLUMNS, TemplateColumn } from './types.js';

export interface TemplateOptions {
  /** Replace an existing file (default). When false an existing destination is an IoError. */
  overwrite?: boolean;
  withExamples?: boolean;
}

interface ColumnGuide {
  required: boolean;
  width: number;
  description: string;
  example: string;
}

export const COLUMN_GUIDE: Record<TemplateColumn, ColumnGuide> = {
  name: {
    required: true,
    width: 32,
    description: 'Product name',
    example: 'Wireless Headphones'
  },
  price: {
    required: true,
    width: 12,
    description: 'Regular price, numbers only (a leading currency symbol is ignored)',
    example: '99.99'
  },
  categories: {
    required: false,
    width: 28,
    description: 'Category names separated by commas; use "Parent > Child" for sub-categories',
    example: 'Audio > Headphones'
  },
  description: {
    required: false,
    width: 48,
    description: 'Product description (HTML supported)',
    example: 'Premium wireless headphones with noise cancellation'
  },
  stock_quantity: {
    required: false,
    width: 16,
    description: 'Whole number of units in stock, defaults to 0',
    example: '25'
  },
  sku: {
    required: false,
    width: 18,
    description: 'Stock keeping unit',
    example: 'WH-2024-BLK'
  },
  images_path: {
    required: false,
    width: 48,
    description: 'Image file or folder; separate several with ";" or ","',
    example: 'images/headphones/front.jpg;images/headphones/side.jpg'
  }
};

const EXAMPLE_ROWS: Array<Record<TemplateColumn, string | number>> = [
  {
    name: 'Ceramic Mug',
    price: 9.99,
    categories: 'Kitchen',
    description: 'Stoneware mug, 350 ml',
    stock_quantity: 10,
    sku: 'MUG-001',
    images_path: 'images/mug'
  },
  {
    name: 'Linen Tea Towel',
    price: 14.5,
    categories: 'Kitchen > Textiles',
    description: 'Pre-washed linen towel',
    stock_quantity: 40,
    sku: 'TOWEL-002',
    images_path: ''
  }
];

function buildWorkbook(withExamples: boolean, csv: boolean): Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet('Products');
  sheet.columns = TEMPLATE_COLUMNS.map(column => ({
    header: column,
    key: column,
    width: COLUMN_GUIDE[column].width
  }));
  sheet.getRow(1).font = { bold: true };

  if (withExamples) {
    for (const row of EXAMPLE_ROWS) {
      sheet.addRow(row);
    }
  }

  if (!csv) {
    const instructions = workbook.addWorksheet('Instructions');
    instructions.columns = [
      { header: 'Column', key: 'column', width: 18 },
      { header: 'Required', key: 'required', width: 10 },
      { header: 'Description', key: 'description', width: 70 },
      { header: 'Example', key: 'example', width: 48 }
    ];
    instructions.getRow(1).font = { bold: true };
    for (const column of TEMPLATE_COLUMNS) {
      const guide = COLUMN_GUIDE[column];
      instructions.addRow({
        column,
        required: guide.required ? 'Yes' : 'No',
        description: guide.description,
        example: guide.example
      });
    }
  }

  return workbook;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes an empty product spreadsheet with the expected header row. The file
 * is written beside the destination first and renamed into place.
 */
export async function generateTemplate(destination: string, options: TemplateOptions = {}): Promise<string> {
  const overwrite = options.overwrite !== false;
  const target = path.resolve(destination);
  const csv = path.extname(target).toLowerCase() === '.csv';

  if (!overwrite && (await exists(target))) {
    throw new IoError(`Template not written: ${target} already exists`, target);
  }

  const tempPath = `${target}.${process.pid}.tmp`;
  const workbook = buildWorkbook(options.withExamples === true, csv);

  try {
    if (csv) {
      await workbook.csv.writeFile(tempPath);
    } else {
      await workbook.xlsx.writeFile(tempPath);
    }
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new IoError(`Failed to write template ${target}: ${describeError(error)}`, target, { cause: error });
  }

  return target;
}
