#!/usr/bin/env node

import inquirer from 'inquirer';
import chalk from 'chalk';
import boxen from 'boxen';
import Table from 'cli-table3';
import gradient from 'gradient-string';
import ora, { type Ora } from 'ora';
import fs from 'fs/promises';
import path from 'path';
import { loadDotEnv } from './env.js';
import { AppConfig, loadConfig } from './config.js';
import { ConfigError, UploaderError, ValidationError, describeError } from './errors.js';
import { WooCommerceClient } from './api/wooCommerceClient.js';
import { WordPressMediaClient } from './api/wordpressMediaClient.js';
import { ProductImageUploader } from './imageUploader.js';
import { WooCategoryResolver, buildCategoryTree, flattenCategoryTree } from './categoryResolver.js';
import { AiHelper } from './aiHelper.js';
import { UploadQueue } from './uploadQueue.js';
import { UploadEvent, UploadSummary, runUpload } from './uploader.js';
import { generateTemplate } from './templateGenerator.js';
import { readProductSheet } from './spreadsheetReader.js';
import { scanProductFolders } from './folderScanner.js';
import { summarizeValidation, validRecords, validateRows } from './validator.js';
import { DisplayRow, DisplayTone, toDisplayRows, truncateMiddle, validationDisplayRows } from './presentation.js';
import { createBatchId, exportResultsCsv, writeBatchLog } from './batchLog.js';
import { addImagePaths, buildManualRow, moveImage, removeImage } from './manualEntry.js';
import type { ValidationResult } from './types.js';

interface LoadedSource {
  source: string;
  results: ValidationResult[];
  skipped: string[];
}

interface UploadChoices {
  concurrency: number;
  productStatus: 'publish' | 'draft';
  generateMissingDescriptions: boolean;
}

const TONE_COLORS: Record<DisplayTone, (text: string) => string> = {
  muted: chalk.dim,
  info: chalk.cyan,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red
};

function renderRows(rows: readonly DisplayRow[], options: { showRemote: boolean }): string {
  const head = ['Row', 'Name', 'SKU', 'Price', 'Img', 'Status'];
  if (options.showRemote) {
    head.push('Remote ID');
  }
  head.push('Details');

  const table = new Table({
    head: head.map(title => chalk.bold(title)),
    style: { head: ['cyan'], border: ['grey'] },
    wordWrap: true,
    colWidths: options.showRemote ? [6, 28, 14, 10, 5, 22, 11, 40] : [6, 28, 14, 10, 5, 22, 40]
  });

  for (const row of rows) {
    const color = TONE_COLORS[row.tone];
    const cells = [String(row.row), row.name, row.sku, row.price, String(row.images), color(row.status)];
    if (options.showRemote) {
      cells.push(row.remoteId);
    }
    cells.push(chalk.dim(row.detail));
    table.push(cells);
  }
  return table.toString();
}

function renderValidation(results: readonly ValidationResult[]): void {
  const summary = summarizeValidation(results);
  console.log(renderRows(validationDisplayRows(results), { showRemote: false }));
  console.log(
    boxen(
      `${chalk.bold('Rows')}: ${summary.total}   ` +
        `${chalk.green('Valid')}: ${summary.valid}   ` +
        `${chalk.red('Invalid')}: ${summary.invalid}\n` +
        `${chalk.bold('Images')}: ${summary.totalImages} ` +
        chalk.dim(`(${summary.withImages} with, ${summary.withoutImages} without)`),
      { padding: { top: 0, bottom: 0, left: 1, right: 1 }, borderStyle: 'round', borderColor: 'cyan' }
    )
  );
}

function renderSummary(summary: UploadSummary, logPath?: string): string {
  const lines = [
    `${chalk.bold('Attempted')}: ${summary.attempted}`,
    `${chalk.green('Succeeded')}: ${summary.succeeded}` +
      (summary.withWarnings > 0 ? chalk.yellow(` (${summary.withWarnings} with warnings)`) : ''),
    `${chalk.red('Failed')}: ${summary.failed}`,
    `${chalk.dim('Still queued')}: ${summary.remaining}`,
    `${chalk.dim('Duration')}: ${(summary.durationMs / 1000).toFixed(1)}s`
  ];
  if (summary.cancelled) {
    lines.push(chalk.yellow('Upload cancelled; remaining items stay queued.'));
  }
  if (summary.systemicAuthFailure) {
    lines.push(chalk.red.bold('Repeated authentication failures: check WC_CONSUMER_KEY / WC_CONSUMER_SECRET.'));
  }
  if (logPath) {
    lines.push(chalk.dim(`Batch log: ${logPath}`));
  }
  return boxen(lines.join('\n'), {
    padding: 1,
    borderStyle: 'round',
    borderColor: summary.failed > 0 || summary.systemicAuthFailure ? 'yellow' : 'green',
    title: chalk.bold('UPLOAD SUMMARY'),
    titleAlignment: 'center'
  });
}

async function loadFromPath(target: string): Promise<LoadedSource> {
  const resolved = path.resolve(target);
  const stat = await fs.stat(resolved).catch(() => null);
  if (stat?.isDirectory()) {
    const scan = await scanProductFolders(resolved);
    const results = await validateRows(scan.rows, { baseDir: resolved });
    return {
      source: resolved,
      results,
      skipped: scan.skipped.map(folder => `${folder.folder}: ${folder.reason}`)
    };
  }
  const sheet = await readProductSheet(resolved);
  const results = await validateRows(sheet.rows, { baseDir: path.dirname(sheet.filePath) });
  return { source: sheet.filePath, results, skipped: [] };
}

class ProductUploader {
  private config: AppConfig;
  private woo: WooCommerceClient;
  private categories: WooCategoryResolver;
  private images?: ProductImageUploader;
  private ai: AiHelper;
  private queue: UploadQueue;
  private loaded: LoadedSource | null;
  private batchId: string;

  constructor(config: AppConfig) {
    this.config = config;
    this.woo = new WooCommerceClient(config);
    this.categories = new WooCategoryResolver(this.woo, config.defaultCategoryId);
    this.images = config.media
      ? new ProductImageUploader(new WordPressMediaClient({ ...config, media: config.media }), this.woo)
      : undefined;
    this.ai = new AiHelper(config.ai, { timeoutMs: config.requestTimeoutMs });
    this.queue = new UploadQueue();
    this.loaded = null;
    this.batchId = createBatchId();
  }

  private showBanner(): void {
    console.clear();
    const title = gradient.pastel.multiline([
      '╔═══════════════════════════════════════════════╗',
      '║                                               ║',
      '║     STOREFRONT BULK UPLOADER                  ║',
      '║     Spreadsheet → WooCommerce products        ║',
      '║                                               ║',
      '╚═══════════════════════════════════════════════╝'
    ].join('\n'));

    console.log('\n' + title + '\n');
  }

  async initialize(): Promise<void> {
    this.showBanner();

    const spinner = ora({ text: 'Checking store connection...', color: 'cyan' }).start();
    const connection = await this.woo.testConnection();
    if (connection.ok) {
      spinner.succeed(chalk.green(connection.message));
    } else {
      spinner.warn(chalk.yellow(`Store not reachable: ${connection.message}`));
    }

    console.log(this.statusTable());
    console.log('');
  }

  private statusTable(): string {
    const table = new Table({
      style: { head: ['cyan'] },
      colWidths: [25, 50]
    });
    table.push(
      ['🛒 Store', chalk.cyan(this.config.storeUrl)],
      ['🖼️  Media uploads', this.config.media ? chalk.green('enabled') : chalk.yellow('disabled (no WP credentials)')],
      ['🏷️  Default category', this.config.defaultCategoryId !== undefined ? chalk.cyan(String(this.config.defaultCategoryId)) : chalk.dim('store default')],
      ['⚙️  Concurrency', chalk.cyan(String(this.config.concurrency))],
      ['⏱️  Request timeout', chalk.cyan(`${this.config.requestTimeoutMs} ms`)],
      ['🤖 AI helper', this.ai.isAvailable() ? chalk.green(`enabled (${this.config.ai?.model})`) : chalk.dim('disabled')],
      ['📦 Queue', chalk.magenta(this.describeQueue())]
    );
    return table.toString();
  }

  private describeQueue(): string {
    const counts = this.queue.counts();
    return `${counts.pending} queued · ${counts.succeeded} uploaded · ${counts.failed} failed`;
  }

  async createTemplate(): Promise<void> {
    console.log(chalk.bold.cyan('\n━━━━━━━━ CREATE TEMPLATE ━━━━━━━━\n'));
    const answers = await inquirer.prompt<{ destination: string; withExamples: boolean }>([
      {
        type: 'input',
        name: 'destination',
        message: chalk.bold('Save template as:'),
        default: 'product_template.xlsx',
        prefix: '📄'
      },
      {
        type: 'confirm',
        name: 'withExamples',
        message: chalk.bold('Include example rows?'),
        default: false,
        prefix: '📝'
      }
    ]);

    const spinner = ora('Writing template...').start();
    const written = await generateTemplate(answers.destination, { withExamples: answers.withExamples });
    spinner.succeed(chalk.green(`Template created: ${written}`));
    console.log('');
  }

  async loadSource(mode: 'sheet' | 'folders'): Promise<void> {
    console.log(chalk.bold.cyan(mode === 'sheet' ? '\n━━━━━━━━ LOAD SPREADSHEET ━━━━━━━━\n' : '\n━━━━━━━━ SCAN PRODUCT FOLDERS ━━━━━━━━\n'));
    const { target } = await inquirer.prompt<{ target: string }>([
      {
        type: 'input',
        name: 'target',
        message: chalk.bold(mode === 'sheet' ? 'Spreadsheet (.xlsx or .csv):' : 'Directory of product folders:'),
        prefix: mode === 'sheet' ? '📄' : '📂',
        validate: (input: string) => (input.trim() ? true : 'A path is required')
      }
    ]);

    const spinner = ora(`Reading ${path.basename(target.trim())}...`).start();
    let loaded: LoadedSource;
    try {
      loaded = await loadFromPath(target.trim());
    } catch (error) {
      spinner.fail(chalk.red(describeError(error)));
      if (error instanceof ValidationError && error.details.length > 0) {
        console.log(chalk.dim(`Expected columns include: ${error.details.join(', ')}`));
      }
      console.log('');
      return;
    }
    this.loaded = loaded;
    const summary = summarizeValidation(loaded.results);
    spinner.succeed(chalk.green(`Loaded ${summary.total} rows (${summary.valid} valid, ${summary.invalid} invalid)`));

    for (const skipped of loaded.skipped) {
      console.log(chalk.yellow(`  Skipped folder ${skipped}`));
    }
    renderValidation(loaded.results);
    console.log('');
  }

  viewLoaded(): void {
    if (!this.loaded) {
      console.log(chalk.yellow('\nNothing loaded yet.\n'));
      return;
    }
    console.log(chalk.bold.cyan(`\n━━━━━━━━ ${path.basename(this.loaded.source)} ━━━━━━━━\n`));
    renderValidation(this.loaded.results);
    console.log('');
  }

  async enqueueLoaded(): Promise<void> {
    if (!this.loaded) {
      console.log(chalk.yellow('\nLoad a spreadsheet first.\n'));
      return;
    }
    const records = validRecords(this.loaded.results);
    if (records.length === 0) {
      console.log(chalk.yellow('\nNo valid rows to queue.\n'));
      return;
    }

    const withoutImages = records.filter(record => record.imagePaths.length === 0).length;
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.bold(
          `Queue ${records.length} products` +
            (withoutImages > 0 ? ` (${withoutImages} without images)` : '') +
            '?'
        ),
        default: true,
        prefix: '📦'
      }
    ]);
    if (!confirm) {
      return;
    }

    this.queue.enqueue(records);
    this.loaded = null;
    console.log(chalk.green(`\n✓ Added ${records.length} products to the queue (${this.describeQueue()})\n`));
  }

  viewQueue(): void {
    console.log(chalk.bold.cyan('\n━━━━━━━━ UPLOAD QUEUE ━━━━━━━━\n'));
    const snapshot = this.queue.snapshot();
    if (snapshot.length === 0) {
      console.log(chalk.dim('Queue is empty.\n'));
      return;
    }
    console.log(renderRows(toDisplayRows(snapshot), { showRemote: true }));
    console.log(chalk.dim(this.describeQueue()));
    console.log('');
  }

  private async askUploadChoices(): Promise<UploadChoices> {
    const missingDescriptions = this.queue
      .snapshot()
      .some(entry => entry.status.state === 'pending' && !entry.record.description);

    const answers = await inquirer.prompt<{ concurrency: number; productStatus: 'publish' | 'draft'; generate?: boolean }>([
      {
        type: 'number',
        name: 'concurrency',
        message: chalk.bold('Parallel uploads:'),
        default: this.config.concurrency,
        prefix: '⚙️',
        validate: (input: number) =>
          Number.isInteger(input) && input >= 1 && input <= 10 ? true : 'Enter a whole number between 1 and 10'
      },
      {
        type: 'list',
        name: 'productStatus',
        message: chalk.bold('Create products as:'),
        choices: [
          { name: 'Published', value: 'publish' },
          { name: 'Draft', value: 'draft' }
        ],
        prefix: '📰'
      },
      {
        type: 'confirm',
        name: 'generate',
        message: chalk.bold('Generate missing descriptions with AI?'),
        default: false,
        prefix: '🤖',
        when: () => missingDescriptions && this.ai.isAvailable()
      }
    ]);

    return {
      concurrency: answers.concurrency,
      productStatus: answers.productStatus,
      generateMissingDescriptions: answers.generate === true
    };
  }

  async uploadQueued(choices?: UploadChoices): Promise<UploadSummary | null> {
    const pending = this.queue.counts().pending;
    if (pending === 0) {
      console.log(chalk.yellow('\nNo queued products to upload.\n'));
      return null;
    }

    const settings = choices ?? (await this.askUploadChoices());
    console.log(chalk.bold.cyan(`\n━━━━━━━━ UPLOADING ${pending} PRODUCTS ━━━━━━━━\n`));
    console.log(chalk.dim('Press Ctrl+C to stop after the products in flight.\n'));

    const controller = new AbortController();
    const spinner = ora({ text: 'Starting upload...', color: 'cyan' }).start();
    const onSigint = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      controller.abort();
      spinner.text = chalk.yellow('Cancelling: waiting for in-flight uploads...');
    };
    process.on('SIGINT', onSigint);

    let finished = 0;
    const print = (line: string) => {
      spinner.clear();
      console.log(line);
      spinner.render();
    };
    const onEvent = (event: UploadEvent) => this.reportEvent(event, spinner, print, () => {
      finished += 1;
      return `${finished}/${pending}`;
    });

    let summary: UploadSummary;
    try {
      summary = await runUpload(
        this.queue,
        {
          api: this.woo,
          categories: this.categories,
          images: this.images,
          fields: this.ai.isAvailable() ? this.ai : undefined
        },
        {
          concurrency: settings.concurrency,
          signal: controller.signal,
          authFailureThreshold: this.config.authFailureThreshold,
          productStatus: settings.productStatus,
          generateMissingDescriptions: settings.generateMissingDescriptions,
          onEvent
        }
      );
    } finally {
      process.off('SIGINT', onSigint);
      spinner.stop();
    }

    const logPath = await writeBatchLog(this.queue.snapshot(), {
      directory: this.config.batchLogDir,
      batchId: this.batchId,
      defaultCategoryId: this.config.defaultCategoryId
    });
    console.log('\n' + renderSummary(summary, logPath) + '\n');
    return summary;
  }

  private reportEvent(event: UploadEvent, spinner: Ora, print: (line: string) => void, progress: () => string): void {
    switch (event.type) {
      case 'started':
        spinner.text = `Uploading ${chalk.cyan(truncateMiddle(event.item.record.name, 40))}...`;
        break;
      case 'succeeded':
        print(`${chalk.green('✓')} ${progress()} ${event.item.record.name} ${chalk.dim(`(ID: ${event.remoteId})`)}`);
        break;
      case 'failed':
        print(`${chalk.red('✗')} ${progress()} ${event.item.record.name} ${chalk.red(event.reason)}`);
        break;
      case 'warning':
        print(`${chalk.yellow('⚠')} ${event.item.record.name}: ${chalk.yellow(event.message)}`);
        break;
      case 'auth-halt':
        print(chalk.red.bold(`✗ ${event.consecutiveFailures} authentication failures in a row; stopping.`));
        break;
    }
  }

  async retryFailed(): Promise<void> {
    const requeued = this.queue.requeueFailed(this.config.maxAttempts);
    if (requeued === 0) {
      console.log(chalk.yellow(`\nNo failed uploads left to retry (limit ${this.config.maxAttempts} attempts).\n`));
      return;
    }
    console.log(chalk.cyan(`\n↻ Re-queued ${requeued} failed products.`));
    await this.uploadQueued();
  }

  async exportResults(): Promise<void> {
    const snapshot = this.queue.snapshot();
    if (snapshot.length === 0) {
      console.log(chalk.yellow('\nQueue is empty; nothing to export.\n'));
      return;
    }
    const { destination } = await inquirer.prompt<{ destination: string }>([
      {
        type: 'input',
        name: 'destination',
        message: chalk.bold('Export results to:'),
        default: `upload_results_${this.batchId}.csv`,
        prefix: '💾'
      }
    ]);
    const count = await exportResultsCsv(snapshot, path.resolve(destination));
    console.log(chalk.green(`\n✓ Exported ${count} rows to ${path.resolve(destination)}\n`));
  }

  async showCategories(): Promise<void> {
    console.log(chalk.bold.cyan('\n━━━━━━━━ STORE CATEGORIES ━━━━━━━━\n'));
    const spinner = ora('Fetching categories...').start();
    const categories = await this.woo.listCategories();
    spinner.succeed(chalk.green(`Found ${categories.length} categories`));
    this.categories.refresh();

    for (const line of flattenCategoryTree(buildCategoryTree(categories))) {
      const isDefault = line.id === this.config.defaultCategoryId;
      console.log(isDefault ? chalk.cyan(`${line.display}  ← default`) : line.display);
    }
    console.log('');
  }

  async aiAssistant(): Promise<void> {
    if (!this.ai.isAvailable()) {
      console.log(chalk.yellow('\nSet OPENAI_API_KEY in .env to enable the AI helper.\n'));
      return;
    }
    const { mode, prompt } = await inquirer.prompt<{ mode: 'titles' | 'description'; prompt: string }>([
      {
        type: 'list',
        name: 'mode',
        message: chalk.bold('Generate:'),
        choices: [
          { name: 'Title ideas', value: 'titles' },
          { name: 'Product description', value: 'description' }
        ],
        prefix: '🤖'
      },
      {
        type: 'input',
        name: 'prompt',
        message: chalk.bold('Describe the product:'),
        prefix: '✏️',
        validate: (input: string) => (input.trim() ? true : 'Enter a short product description')
      }
    ]);

    const spinner = ora('Asking the model...').start();
    if (mode === 'titles') {
      const titles = await this.ai.generateTitles(prompt.trim(), 3);
      spinner.succeed(chalk.green(`${titles.length} titles`));
      titles.forEach((title, index) => console.log(`  ${chalk.cyan(`${index + 1}.`)} ${title}`));
    } else {
      const description = await this.ai.generateDescription(prompt.trim());
      spinner.succeed(chalk.green('Description ready'));
      console.log(boxen(description, { padding: 1, borderStyle: 'round', borderColor: 'cyan' }));
    }
    console.log('');
  }

  private async suggestTitle(): Promise<string | undefined> {
    if (!this.ai.isAvailable()) {
      return undefined;
    }
    const { wanted } = await inquirer.prompt<{ wanted: boolean }>([
      { type: 'confirm', name: 'wanted', message: chalk.bold('Suggest titles with AI?'), default: false, prefix: '🤖' }
    ]);
    if (!wanted) {
      return undefined;
    }
    const { prompt } = await inquirer.prompt<{ prompt: string }>([
      {
        type: 'input',
        name: 'prompt',
        message: chalk.bold('Describe the product:'),
        prefix: '✏️',
        validate: (input: string) => (input.trim() ? true : 'Enter a short product description')
      }
    ]);

    const spinner = ora('Asking the model...').start();
    let titles: string[];
    try {
      titles = await this.ai.generateTitles(prompt.trim(), 3);
    } catch (error) {
      if (!(error instanceof UploaderError)) {
        throw error;
      }
      spinner.fail(chalk.yellow(`No suggestions: ${error.message}`));
      return undefined;
    }
    spinner.succeed(chalk.green(`${titles.length} titles`));

    const { title } = await inquirer.prompt<{ title: string }>([
      {
        type: 'list',
        name: 'title',
        message: chalk.bold('Use a suggestion?'),
        choices: [...titles.map(value => ({ name: value, value })), { name: 'Type my own', value: '' }],
        prefix: '🏷️'
      }
    ]);
    return title || undefined;
  }

  private async pickCategories(): Promise<string[]> {
    const spinner = ora('Fetching categories...').start();
    let lines: Array<{ display: string; id: number }>;
    try {
      lines = flattenCategoryTree(buildCategoryTree(await this.woo.listCategories()));
      spinner.stop();
    } catch (error) {
      if (!(error instanceof UploaderError)) {
        throw error;
      }
      spinner.warn(chalk.yellow(`Categories unavailable: ${error.message}`));
      lines = [];
    }

    if (lines.length === 0) {
      const { typed } = await inquirer.prompt<{ typed: string }>([
        { type: 'input', name: 'typed', message: chalk.bold('Categories (separate with ;):'), prefix: '🏷️' }
      ]);
      return typed.split(/[;,]/).map(part => part.trim()).filter(part => part.length > 0);
    }

    const { picked } = await inquirer.prompt<{ picked: string[] }>([
      {
        type: 'checkbox',
        name: 'picked',
        message: chalk.bold('Categories:'),
        choices: lines.map(line => ({
          name: line.display,
          value: String(line.id),
          checked: line.id === this.config.defaultCategoryId
        })),
        pageSize: 15,
        prefix: '🏷️'
      }
    ]);
    return picked;
  }

  private async editImages(): Promise<string[]> {
    let images: string[] = [];
    while (true) {
      if (images.length > 0) {
        console.log(chalk.bold('\n  Images (first is the main image):'));
        images.forEach((image, index) => console.log(`  ${chalk.cyan(`${index + 1}.`)} ${truncateMiddle(image, 60)}`));
      }
      const { step } = await inquirer.prompt<{ step: 'add' | 'move' | 'remove' | 'done' }>([
        {
          type: 'list',
          name: 'step',
          message: chalk.bold('Images:'),
          choices: [
            { name: 'Add image files, folders or patterns', value: 'add' },
            ...(images.length > 1 ? [{ name: 'Move an image', value: 'move' }] : []),
            ...(images.length > 0 ? [{ name: 'Remove an image', value: 'remove' }] : []),
            { name: 'Done', value: 'done' }
          ],
          prefix: '🖼️'
        }
      ]);

      if (step === 'done') {
        return images;
      }
      if (step === 'add') {
        const { entries } = await inquirer.prompt<{ entries: string }>([
          { type: 'input', name: 'entries', message: chalk.bold('Paths (separate with ;):'), prefix: '📁' }
        ]);
        images = addImagePaths(images, entries.split(';'));
        continue;
      }

      const positions = images.map((image, index) => ({ name: `${index + 1}. ${path.basename(image)}`, value: index }));
      const { from } = await inquirer.prompt<{ from: number }>([
        { type: 'list', name: 'from', message: chalk.bold('Which image?'), choices: positions, prefix: '🖼️' }
      ]);
      if (step === 'remove') {
        images = removeImage(images, from);
        continue;
      }
      const { to } = await inquirer.prompt<{ to: number }>([
        { type: 'list', name: 'to', message: chalk.bold('Move to position:'), choices: positions, prefix: '↕️' }
      ]);
      images = moveImage(images, from, to);
    }
  }

  /** Builds one product from prompts and queues it once it validates. */
  async addSingleProduct(): Promise<void> {
    console.log(chalk.bold.cyan('\n━━━━━━━━ ADD A PRODUCT ━━━━━━━━\n'));
    const suggested = await this.suggestTitle();
    const fields = await inquirer.prompt<{
      name: string;
      price: string;
      description: string;
      sku: string;
      stockQuantity: string;
    }>([
      {
        type: 'input',
        name: 'name',
        message: chalk.bold('Title:'),
        default: suggested,
        validate: (input: string) => (input.trim() ? true : 'A title is required')
      },
      { type: 'input', name: 'price', message: chalk.bold('Price:') },
      { type: 'input', name: 'description', message: chalk.bold('Description:') },
      { type: 'input', name: 'sku', message: chalk.bold('SKU (optional):') },
      { type: 'input', name: 'stockQuantity', message: chalk.bold('Stock quantity:'), default: '0' }
    ]);
    const categories = await this.pickCategories();
    const imagePaths = await this.editImages();

    const results = await validateRows([buildManualRow({ ...fields, categories, imagePaths })]);
    const [result] = results;
    if (result.kind === 'invalid') {
      renderValidation(results);
      console.log(chalk.red('\nProduct not queued: fix the problems above and try again.\n'));
      return;
    }

    this.queue.enqueue([result.record]);
    console.log(chalk.green(`\n✓ Queued "${result.record.name}" (${this.describeQueue()})\n`));
  }

  async runDoctor(): Promise<boolean> {
    console.log(chalk.bold.cyan('\n━━━━━━━━ CONNECTION CHECK ━━━━━━━━\n'));
    console.log(this.statusTable());
    const spinner = ora('Contacting store...').start();
    const connection = await this.woo.testConnection();
    if (connection.ok) {
      spinner.succeed(chalk.green(connection.message));
    } else {
      spinner.fail(chalk.red(connection.message));
    }
    console.log('');
    return connection.ok;
  }

  async clearQueue(): Promise<void> {
    const { scope } = await inquirer.prompt<{ scope: 'finished' | 'all' | 'cancel' }>([
      {
        type: 'list',
        name: 'scope',
        message: chalk.bold('Clear which items?'),
        choices: [
          { name: 'Finished uploads only', value: 'finished' },
          { name: 'Everything in the queue', value: 'all' },
          { name: 'Cancel', value: 'cancel' }
        ],
        prefix: '🗑️'
      }
    ]);
    if (scope === 'cancel') {
      return;
    }
    const removed = scope === 'all' ? this.queue.clear() : this.queue.clearFinished();
    console.log(chalk.green(`\n✓ Removed ${removed} items (${this.describeQueue()})\n`));
  }

  async run(): Promise<void> {
    await this.initialize();

    while (true) {
      const { action } = await inquirer.prompt<{ action: string }>([
        {
          type: 'list',
          name: 'action',
          message: chalk.bold(`What would you like to do? ${chalk.dim(`[${this.describeQueue()}]`)}`),
          pageSize: 19,
          choices: [
            new inquirer.Separator(chalk.dim('── Products ──')),
            { name: '📄 Create spreadsheet template', value: 'template' },
            { name: '📄 Load & validate spreadsheet', value: 'load' },
            { name: '📂 Scan product folders', value: 'scan' },
            { name: '➕ Add a single product', value: 'add-product' },
            { name: '🔍 View loaded rows', value: 'view-loaded' },
            { name: '📦 Queue all valid rows', value: 'enqueue' },
            new inquirer.Separator(chalk.dim('── Upload ──')),
            { name: '🚀 Upload queued products', value: 'upload' },
            { name: '↻  Retry failed uploads', value: 'retry' },
            { name: '📋 View queue', value: 'view-queue' },
            { name: '💾 Export results (CSV)', value: 'export' },
            { name: '🗑️  Clear queue', value: 'clear' },
            new inquirer.Separator(chalk.dim('── Store ──')),
            { name: '🏷️  List categories', value: 'categories' },
            { name: '🤖 AI title / description helper', value: 'ai' },
            { name: '🩺 Test connection', value: 'doctor' },
            new inquirer.Separator(),
            { name: '👋 Exit', value: 'exit' }
          ]
        }
      ]);

      if (action === 'exit') {
        console.log(boxen(chalk.bold.green('Goodbye!'), { padding: { top: 0, bottom: 0, left: 2, right: 2 }, borderStyle: 'round', borderColor: 'green' }));
        return;
      }

      try {
        await this.dispatch(action);
      } catch (error) {
        if (error instanceof UploaderError) {
          console.log(chalk.red(`\n✗ ${error.message}\n`));
        } else {
          throw error;
        }
      }
    }
  }

  private async dispatch(action: string): Promise<void> {
    switch (action) {
      case 'template':
        return this.createTemplate();
      case 'load':
        return this.loadSource('sheet');
      case 'scan':
        return this.loadSource('folders');
      case 'add-product':
        return this.addSingleProduct();
      case 'view-loaded':
        return this.viewLoaded();
      case 'enqueue':
        return this.enqueueLoaded();
      case 'upload':
        await this.uploadQueued();
        return;
      case 'retry':
        return this.retryFailed();
      case 'view-queue':
        return this.viewQueue();
      case 'export':
        return this.exportResults();
      case 'clear':
        return this.clearQueue();
      case 'categories':
        return this.showCategories();
      case 'ai':
        return this.aiAssistant();
      case 'doctor':
        await this.runDoctor();
        return;
    }
  }

  /** Non-interactive load → queue → upload used by the `upload` command. */
  async uploadFrom(target: string, choices: Partial<UploadChoices>): Promise<UploadSummary | null> {
    const spinner = ora(`Reading ${path.basename(target)}...`).start();
    const loaded = await loadFromPath(target);
    const summary = summarizeValidation(loaded.results);
    spinner.succeed(chalk.green(`Loaded ${summary.total} rows (${summary.valid} valid, ${summary.invalid} invalid)`));
    for (const skipped of loaded.skipped) {
      console.log(chalk.yellow(`  Skipped folder ${skipped}`));
    }

    const invalid = loaded.results.filter(result => result.kind === 'invalid');
    if (invalid.length > 0) {
      console.log(renderRows(validationDisplayRows(invalid), { showRemote: false }));
    }

    this.queue.enqueue(validRecords(loaded.results));
    return this.uploadQueued({
      concurrency: choices.concurrency ?? this.config.concurrency,
      productStatus: choices.productStatus ?? 'publish',
      generateMissingDescriptions: choices.generateMissingDescriptions ?? false
    });
  }
}

interface ParsedArgs {
  command?: string;
  positional: string[];
  flags: Map<string, string | true>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '-h') {
      flags.set('help', true);
    } else if (arg.startsWith('--')) {
      const [key, inline] = arg.slice(2).split('=', 2);
      const next = argv[i + 1];
      if (inline !== undefined) {
        flags.set(key, inline);
      } else if (key === 'concurrency' && next !== undefined) {
        flags.set(key, next);
        i += 1;
      } else {
        flags.set(key, true);
      }
    } else {
      positional.push(arg);
    }
  }
  const command = positional.length > 0 ? positional[0].toLowerCase() : undefined;
  return { command, positional: positional.slice(1), flags };
}

function printHelp(): void {
  console.log(`
Usage:
  storefront-uploader [command]

Commands:
  (none)                      Interactive menu
  template <file> [--examples] [--no-overwrite]
                              Write an empty .xlsx or .csv product template
  validate <file>             Validate a spreadsheet without uploading
  scan <dir>                  Validate a directory of product folders
  upload <file|dir> [--concurrency N] [--draft] [--ai-descriptions]
                              Validate, queue and upload every valid row
  categories                  List store categories with their ids
  doctor                      Show configuration and test the store connection
  -h, --help                  Show this help menu

Environment (.env):
  STORE_URL, WC_CONSUMER_KEY, WC_CONSUMER_SECRET   required
  WP_USERNAME, WP_APP_PASSWORD                     image uploads
  WC_DEFAULT_CATEGORY_ID, UPLOAD_CONCURRENCY, REQUEST_TIMEOUT_MS,
  AUTH_FAILURE_THRESHOLD, UPLOAD_MAX_ATTEMPTS, BATCH_LOG_DIR,
  OPENAI_API_KEY, OPENAI_MODEL, OPENAI_BASE_URL
`.trim());
  console.log('');
}

async function runTemplateCommand(args: ParsedArgs): Promise<void> {
  const destination = args.positional[0] ?? 'product_template.xlsx';
  const written = await generateTemplate(destination, {
    withExamples: args.flags.has('examples'),
    overwrite: !args.flags.has('no-overwrite')
  });
  console.log(chalk.green(`✓ Template created: ${written}`));
}

async function runValidateCommand(args: ParsedArgs): Promise<boolean> {
  const target = args.positional[0];
  if (!target) {
    console.log(chalk.red('validate needs a spreadsheet or directory path'));
    return false;
  }
  const spinner = ora(`Reading ${path.basename(target)}...`).start();
  const loaded = await loadFromPath(target);
  spinner.stop();
  for (const skipped of loaded.skipped) {
    console.log(chalk.yellow(`Skipped folder ${skipped}`));
  }
  renderValidation(loaded.results);
  return loaded.results.every(result => result.kind === 'valid');
}

async function runScanCommand(args: ParsedArgs): Promise<boolean> {
  const target = args.positional[0];
  if (!target) {
    console.log(chalk.red('scan needs a directory of product folders'));
    return false;
  }
  const stat = await fs.stat(target).catch(() => null);
  if (!stat?.isDirectory()) {
    console.log(chalk.red(`Not a directory: ${target}`));
    return false;
  }
  return runValidateCommand(args);
}

async function createUploader(): Promise<ProductUploader> {
  await loadDotEnv();
  return new ProductUploader(loadConfig());
}

function fail(label: string): (error: unknown) => never {
  return (error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(chalk.red.bold(`\n❌ ${label}: configuration problem`));
      for (const problem of error.problems) {
        console.error(chalk.red(`   • ${problem}`));
      }
      console.error(chalk.dim('   Copy .env.example to .env and fill in your store credentials.'));
    } else {
      console.error(chalk.red.bold(`\n❌ ${label}:`), error instanceof UploaderError ? error.message : error);
    }
    process.exit(1);
  };
}

// Main entry point
const args = parseArgs(process.argv.slice(2));
const command = args.command;

if (args.flags.has('help') || command === 'help') {
  printHelp();
  process.exit(0);
} else if (command === 'template') {
  runTemplateCommand(args).catch(fail('Template failed'));
} else if (command === 'validate') {
  runValidateCommand(args)
    .then(allValid => process.exit(allValid ? 0 : 1))
    .catch(fail('Validation failed'));
} else if (command === 'scan') {
  runScanCommand(args)
    .then(allValid => process.exit(allValid ? 0 : 1))
    .catch(fail('Scan failed'));
} else if (command === 'upload') {
  const target = args.positional[0];
  if (!target) {
    console.log(chalk.red('upload needs a spreadsheet or directory path'));
    process.exit(1);
  }
  createUploader()
    .then(uploader => {
      const concurrencyFlag = args.flags.get('concurrency');
      const concurrency = typeof concurrencyFlag === 'string' ? Number.parseInt(concurrencyFlag, 10) : Number.NaN;
      return uploader.uploadFrom(target, {
        concurrency: Number.isInteger(concurrency) && concurrency > 0 ? Math.min(concurrency, 10) : undefined,
        productStatus: args.flags.has('draft') ? 'draft' : 'publish',
        generateMissingDescriptions: args.flags.has('ai-descriptions')
      });
    })
    .then(summary => process.exit(summary && summary.failed === 0 && !summary.systemicAuthFailure ? 0 : 1))
    .catch(fail('Upload failed'));
} else if (command === 'categories') {
  createUploader()
    .then(uploader => uploader.showCategories())
    .catch(fail('Listing categories failed'));
} else if (command === 'doctor') {
  createUploader()
    .then(uploader => uploader.runDoctor())
    .then(ok => process.exit(ok ? 0 : 1))
    .catch(fail('Doctor failed'));
} else if (command !== undefined) {
  console.log(chalk.red(`Unknown command: ${command}`));
  printHelp();
  process.exit(1);
} else {
  createUploader()
    .then(uploader => uploader.run())
    .catch(fail('Fatal error'));
}
