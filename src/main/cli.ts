#!/usr/bin/env node
/**
 * Inspection CLI
 * Usage: npm run inspect -- [options] <email-file-or-directory...>
 *
 * Prints one row per email (subject snippet, body and HTML lengths), the
 * full JSON records, summaries, or writes one attachment to disk.
 * Directories are expanded to the .msg and .eml files they contain.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { InspectOptionsSchema, type InspectOptions } from '@shared/schemas/validation';
import { formatISO8601 } from '@shared/utils/dateUtils';
import { clearContextId, logger, setContextId } from './config/logger';
import { ErrorCategory, errorHandler } from './error-handler';
import { parserFactory, type ParserFactory } from './email/parsers/ParserFactory';
import type { CanonicalEmail, EmailSummary } from './email/parsers/EmailParser';

const EMAIL_EXTENSIONS = new Set(['.msg', '.eml']);
const SNIPPET_LENGTH = 60;

export const TABLE_HEADER = 'filename\tsubject_snippet\tbody_len\thtml_len';
export const PARSE_ERROR = 'PARSE_ERROR';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

interface RawArgs {
  files: string[];
  mode?: string;
  attachment?: string;
  out?: string;
  help: boolean;
}

export function parseArgs(args: string[]): RawArgs {
  const options: RawArgs = { files: [], help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--json') {
      options.mode = 'json';
    } else if (arg === '--summary') {
      options.mode = 'summary';
    } else if (arg === '--diagnose') {
      options.mode = 'diagnose';
    } else if (arg === '--attachment') {
      options.attachment = args[++i];
    } else if (arg === '--out') {
      options.out = args[++i];
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (!arg.startsWith('-')) {
      options.files.push(arg);
    }
  }

  return options;
}

const HELP = `
Email inspection

Usage:
  npm run inspect -- [options] <email-file-or-directory...>

Options:
  --json                 Print the full records as JSON
  --summary              Print summaries as JSON
  --diagnose             Print subject, body and HTML statistics per file
  --attachment <name>    Write the named attachment of a single email
  --out <path>           Destination for --attachment
  --help, -h             Show this help message

Examples:
  npm run inspect -- samples/
  npm run inspect -- --json samples/welcome.eml
  npm run inspect -- --attachment report.pdf --out /tmp/report.pdf samples/invoice.msg
`;

/**
 * Subject cut to 60 characters, with an ellipsis when truncated
 */
export function subjectSnippet(subject: string): string {
  return subject.length > SNIPPET_LENGTH ? `${subject.slice(0, SNIPPET_LENGTH)}…` : subject;
}

export function formatTableRow(filename: string, email: CanonicalEmail | undefined): string {
  if (!email) {
    return `${filename}\t${PARSE_ERROR}\t0\t0`;
  }
  const bodyLength = email.body?.length ?? 0;
  const htmlLength = email.htmlBody?.length ?? 0;
  return `${filename}\t${subjectSnippet(email.subject)}\t${bodyLength}\t${htmlLength}`;
}

export function formatDiagnosis(filename: string, email: CanonicalEmail | undefined): string[] {
  if (!email) {
    return [filename, PARSE_ERROR];
  }
  const html = email.htmlBody ?? '';
  return [
    filename,
    `subject_len\t${email.subject.length}`,
    `body_len\t${email.body?.length ?? 0}`,
    `html_len\t${html.length}`,
    `starts_with_html\t${html.trim().slice(0, 15)}`,
  ];
}

function serializeDates<T extends { date?: Date }>(record: T) {
  return { ...record, date: record.date ? formatISO8601(record.date) : null };
}

/**
 * Expand directories to the email files they contain, sorted by name
 */
export async function expandInputs(inputs: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    // Unreadable paths are reported by the parse step
    const stats = await fs.stat(input).catch(() => undefined);
    if (!stats?.isDirectory()) {
      files.push(input);
      continue;
    }
    const entries = await fs.readdir(input);
    entries
      .filter((entry) => EMAIL_EXTENSIONS.has(path.extname(entry).toLowerCase()))
      .sort()
      .forEach((entry) => files.push(path.join(input, entry)));
  }

  return files;
}

async function writeAttachment(
  factory: ParserFactory,
  options: InspectOptions,
  io: CliIO
): Promise<number> {
  const [file] = options.files;
  const name = options.attachment ?? '';
  const out = options.out ?? '';

  const bytes = await factory.extractAttachmentFile(file, name);
  if (!bytes) {
    errorHandler.reportError(
      new Error(`Attachment ${name} not found in ${path.basename(file)}`),
      ErrorCategory.ATTACHMENT,
      'CLI',
      { file, name }
    );
    return 1;
  }

  await fs.writeFile(out, bytes);
  io.stdout(`Wrote ${bytes.length} bytes to ${out}`);
  return 0;
}

async function inspectFiles(factory: ParserFactory, options: InspectOptions, io: CliIO): Promise<number> {
  const files = await expandInputs(options.files);
  const records: Array<CanonicalEmail | EmailSummary | undefined> = [];
  let failures = 0;

  if (options.mode === 'table') {
    io.stdout(TABLE_HEADER);
  }

  for (const file of files) {
    const filename = path.basename(file);
    setContextId(filename);

    try {
      if (options.mode === 'summary') {
        const summary = await factory.parseSummaryFile(file);
        if (!summary) failures++;
        records.push(summary);
        continue;
      }

      const email = await factory.parseDetailFile(file);
      if (!email) failures++;

      if (options.mode === 'table') {
        io.stdout(formatTableRow(filename, email));
      } else if (options.mode === 'diagnose') {
        formatDiagnosis(filename, email).forEach((line) => io.stdout(line));
      } else {
        records.push(email);
      }
    } finally {
      clearContextId();
    }
  }

  if (options.mode === 'json' || options.mode === 'summary') {
    io.stdout(JSON.stringify(records.map((record) => (record ? serializeDates(record) : null)), null, 2));
  }

  logger.info('CLI', 'Inspection finished', { files: files.length, failures });
  return 0;
}

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function runCli(
  args: string[],
  io: CliIO = defaultIO,
  factory: ParserFactory = parserFactory
): Promise<number> {
  const raw = parseArgs(args);
  if (raw.help) {
    io.stdout(HELP);
    return 0;
  }

  const parsed = InspectOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    parsed.error.issues.forEach((issue) => io.stderr(`Error: ${issue.message}`));
    io.stderr('Run with --help for usage.');
    return 2;
  }

  const options = parsed.data;
  return options.attachment !== undefined
    ? writeAttachment(factory, options, io)
    : inspectFiles(factory, options, io);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && path.resolve(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  errorHandler.initialize();
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const failure = error instanceof Error ? error : new Error(String(error));
      errorHandler.reportError(failure, errorHandler.categorizeError(failure), 'CLI');
      process.exitCode = 1;
    });
}
