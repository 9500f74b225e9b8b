#!/usr/bin/env node
/**
 * verimail CLI - verify the email addresses listed in a text file
 *
 * Usage:
 *   verimail <file> [options]
 *   npm run validate-file -- <file> [options]
 *
 * Options:
 *   --offline            Bundled datasets only, no network checks
 *   --smtp               Probe mailboxes over SMTP
 *   --no-catch-all       Skip the catch-all probe during SMTP checks
 *   --concurrency <n>    Addresses verified at once (default: 20)
 *   --out <file>         Write full JSON results to file
 *   --help, -h           Show help
 */

import * as fs from 'fs';
import * as path from 'path';
import { config as envConfig } from '../config/env';
import { VerifierOptions } from '../config/options';
import { createEmailVerifier } from '../services/verifierFactory';
import { CheckResult } from '../types/checkResult';
import { EmailValidationResult } from '../types/validationResult';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * CLI configuration parsed from arguments
 */
export interface CliConfig {
  inputFile: string;
  offline: boolean;
  smtp: boolean;
  catchAllCheck: boolean;
  concurrency: number;
  outputFile?: string;
  showHelp: boolean;
}

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

const FLAGS_WITH_VALUE = new Set(['--out', '--concurrency']);

/**
 * Parse command line arguments
 * @throws CliError for malformed flag values
 */
export function parseArgs(args: string[]): CliConfig {
  const config: CliConfig = {
    inputFile: '',
    offline: false,
    smtp: false,
    catchAllCheck: true,
    concurrency: 20,
    showHelp: false,
  };

  if (args.includes('--help') || args.includes('-h')) {
    config.showHelp = true;
    return config;
  }

  // Input file: first argument that is neither a flag nor a flag's value
  const positional = args.filter((arg, index) => !arg.startsWith('--') && !FLAGS_WITH_VALUE.has(args[index - 1]));
  if (positional.length > 0) {
    config.inputFile = positional[0];
  }

  config.offline = args.includes('--offline');
  config.smtp = args.includes('--smtp');
  config.catchAllCheck = !args.includes('--no-catch-all');

  const outIndex = args.indexOf('--out');
  if (outIndex !== -1 && args[outIndex + 1]) {
    config.outputFile = args[outIndex + 1];
  }

  const concurrencyIndex = args.indexOf('--concurrency');
  if (concurrencyIndex !== -1) {
    const value = Number(args[concurrencyIndex + 1]);
    if (!Number.isInteger(value) || value < 1) {
      throw new CliError(`--concurrency expects a positive integer (got: ${args[concurrencyIndex + 1] ?? 'nothing'})`);
    }
    config.concurrency = value;
  }

  if (config.offline && config.smtp) {
    throw new CliError('--offline and --smtp cannot be combined');
  }

  return config;
}

/**
 * Without --offline the VERIMAIL_OFFLINE default from the environment applies
 */
export function toVerifierOptions(config: CliConfig): VerifierOptions {
  if (config.offline) {
    return { offline: true };
  }
  if (!config.smtp) {
    return {};
  }
  return { smtp: { enabled: true, catchAllCheck: config.catchAllCheck } };
}

function showHelp(): void {
  console.log(`
verimail - email address verification
━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━

USAGE
  verimail <file> [options]

ARGUMENTS
  <file>                Text file with one address per line ("#" starts a comment)

OPTIONS
  --offline             Use bundled datasets only; MX, avatar and SMTP are skipped
  --smtp                Probe mailboxes over SMTP (needs outbound port 25)
  --no-catch-all        Skip the catch-all probe during SMTP checks
  --concurrency <n>     Addresses verified at once (default: 20)
  --out <file>          Write full JSON results to specified file
  --help, -h            Show this help message

EXAMPLES
  verimail emails.txt
  verimail emails.txt --offline --out results.json
  verimail emails.txt --smtp --concurrency 5
`);
}

/**
 * Addresses from list text: trimmed, blank lines and "#" comments dropped
 */
export function parseEmailList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

function readEmailsFromFile(filePath: string): string[] {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new CliError(`File not found: ${filePath}`);
  }

  const emails = parseEmailList(fs.readFileSync(absolutePath, 'utf-8'));
  if (emails.length === 0) {
    throw new CliError(`No emails found in file: ${filePath}`);
  }

  return emails;
}

function writeJsonOutput(filePath: string, results: EmailValidationResult[]): void {
  const absolutePath = path.resolve(filePath);
  fs.writeFileSync(absolutePath, JSON.stringify(results, null, 2), 'utf-8');
  console.log(`\n✓ Full results written to: ${absolutePath}`);
}

/**
 * Fit a value into a fixed-width table cell
 */
export function formatValue(value: string, maxLength: number = 20): string {
  if (value.length > maxLength) {
    return value.substring(0, maxLength - 3) + '...';
  }
  return value.padEnd(maxLength);
}

const STATUS_LABELS = {
  passed: 'pass',
  failed: 'FAIL',
  skipped: '-',
  errored: 'error',
} as const;

export function formatStatus<T>(result: CheckResult<T>): string {
  return STATUS_LABELS[result.status];
}

const COLUMNS: Array<{ title: string; width: number; cell: (result: EmailValidationResult) => string }> = [
  { title: 'Email', width: 30, cell: result => result.email },
  { title: 'Syntax', width: 6, cell: result => formatStatus(result.syntax) },
  { title: 'Domain', width: 6, cell: result => formatStatus(result.registrability) },
  { title: 'MX', width: 5, cell: result => formatStatus(result.mx) },
  { title: 'Disposable', width: 10, cell: result => formatStatus(result.disposable) },
  { title: 'Free', width: 5, cell: result => formatStatus(result.free) },
  { title: 'Role', width: 5, cell: result => formatStatus(result.roleBasedUsername) },
  { title: 'Avatar', width: 6, cell: result => formatStatus(result.avatar) },
  { title: 'SMTP', width: 5, cell: result => formatStatus(result.smtp) },
  { title: 'Likely', width: 6, cell: result => (result.isLikelyDeliverable() ? 'Yes' : 'No') },
];

export function formatRow(result: EmailValidationResult): string {
  return COLUMNS.map(column => formatValue(column.cell(result), column.width)).join(' │ ');
}

function percentage(count: number, total: number): string {
  return `${count} (${((count / total) * 100).toFixed(1)}%)`;
}

function printResultsTable(results: EmailValidationResult[]): void {
  const header = COLUMNS.map(column => column.title.padEnd(column.width)).join(' │ ');

  console.log('\n' + '='.repeat(header.length));
  console.log('VERIFICATION RESULTS');
  console.log('='.repeat(header.length));
  console.log(header);
  console.log('─'.repeat(header.length));

  for (const result of results) {
    console.log(formatRow(result));
  }

  console.log('='.repeat(header.length));

  const count = (predicate: (result: EmailValidationResult) => boolean) => results.filter(predicate).length;

  console.log(`\nSUMMARY`);
  console.log(`  Total emails:        ${results.length}`);
  console.log(`  Valid syntax:        ${percentage(count(r => r.syntax.status === 'passed'), results.length)}`);
  console.log(`  Has MX records:      ${percentage(count(r => r.mx.status === 'passed'), results.length)}`);
  console.log(`  Disposable domains:  ${percentage(count(r => r.disposable.status === 'failed'), results.length)}`);
  console.log(`  Free providers:      ${percentage(count(r => r.free.status === 'failed'), results.length)}`);
  console.log(`  Role accounts:       ${percentage(count(r => r.roleBasedUsername.status === 'failed'), results.length)}`);
  console.log(`  Likely deliverable:  ${percentage(count(r => r.isLikelyDeliverable()), results.length)}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const config = parseArgs(args);

  if (config.showHelp || args.length === 0) {
    showHelp();
    return;
  }

  if (!config.inputFile) {
    throw new CliError('Missing required argument: <file>\nRun with --help for usage information');
  }

  console.log('verimail');
  console.log('━'.repeat(50));
  console.log(`Input file:  ${config.inputFile}`);
  console.log(`Mode:        ${config.offline || envConfig.offline ? 'offline (bundled datasets)' : 'online'}`);
  console.log(`SMTP check:  ${config.smtp ? 'Enabled' : 'Disabled'}`);
  if (config.outputFile) {
    console.log(`JSON output: ${config.outputFile}`);
  }
  console.log('━'.repeat(50));

  const emails = readEmailsFromFile(config.inputFile);
  console.log(`\n📧 Found ${emails.length} email(s) to verify\n`);

  const verifier = await createEmailVerifier(toVerifierOptions(config));
  const startTime = Date.now();

  try {
    const results = await verifier.verifyBatch(emails, config.concurrency);

    const duration = Date.now() - startTime;
    console.log(
      `⏱  Verification completed in ${(duration / 1000).toFixed(2)}s (avg: ${(duration / emails.length).toFixed(0)}ms per email)`
    );

    printResultsTable(results);

    if (config.outputFile) {
      writeJsonOutput(config.outputFile, results);
    }
  } finally {
    await verifier.close();
  }

  console.log('\n✨ Done!\n');
}

if (require.main === module) {
  main().catch(error => {
    if (error instanceof CliError) {
      console.error(`❌ Error: ${error.message}`);
    } else {
      console.error('❌ Fatal error:', errorMessage(error));
      logger.error('CLI fatal error:', error);
    }
    process.exit(1);
  });
}

export { main };
