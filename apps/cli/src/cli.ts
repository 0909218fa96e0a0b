import type { LogStream } from '@tocio/logger';

import type { CliOptions, EnvConfig } from './config/cli-config';

import { createConsoleLogger } from '@tocio/logger';
import { PdfOutlineDocument } from '@tocio/pdf-outline';
import {
  DocumentIOError,
  TocProcessError,
  TocProcessor,
  isTocError,
} from '@tocio/toc-processor';
import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { ZodError } from 'zod';

import packageJson from '../package.json';
import { cliOptionsSchema, loadEnvConfig } from './config/cli-config';
import { UsageError, describeError } from './errors';
import { defaultOutputPath, readStream } from './utils';

/**
 * Streams and environment the command runs against
 */
export interface CliIO {
  stdin: AsyncIterable<string | Uint8Array> & { isTTY?: boolean };
  stdout: LogStream;
  stderr: LogStream;
  env: NodeJS.ProcessEnv;
}

type Command =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: CliOptions; env: EnvConfig };

/**
 * Value of `--toc` that reads the ToC from standard input
 */
const STDIN_PATH = '-';

const OPTIONS = {
  out: { type: 'string', short: 'o' },
  toc: { type: 'string', short: 't' },
  'human-readable': { type: 'boolean', short: 'H' },
  encoding: { type: 'string', short: 'e' },
  'replace-unsupported': { type: 'boolean' },
  debug: { type: 'boolean', short: 'g' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'V' },
} as const;

export const USAGE = `Usage: tocio [options] <in.pdf>

Read or write the table of contents (outline) of a PDF.

Without ToC input, print the outline of in.pdf:

  $ tocio in.pdf
  $ tocio -H in.pdf

With ToC input from a file or a pipe, write it into a copy of in.pdf:

  $ tocio -t toc.txt in.pdf
  $ tocio in.pdf < toc.txt
  $ tocio -t toc.txt -o out.pdf in.pdf

ToC format: one entry per line, "title|page" or "title|page|offset",
indented with one TAB per level. Offsets are points below the top of the page.

Options:
  -o, --out <out.pdf>        output file (default: <in>_out.pdf)
  -t, --toc <file>           ToC file, "-" for standard input
  -H, --human-readable       print the outline as a readable tree
  -e, --encoding <encoding>  title encoding: auto, pdfdoc or utf16be (default: auto)
      --replace-unsupported  replace characters the encoding cannot hold with "?"
  -g, --debug                show debug logs and raise errors with stack traces
  -h, --help                 show this help
  -V, --version              show the version

Environment:
  TOCIO_LOG_LEVEL       debug, info, warn, error or silent (default: warn)
  TOCIO_OUTPUT_SUFFIX   suffix of the default output file (default: _out)
`;

/**
 * Run the command
 *
 * @returns Exit code: 0 on success, 1 on a handled error, 2 on a usage error
 * @throws Any error when `--debug` is set, and unexpected errors always
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO,
): Promise<number> {
  let command: Command;
  try {
    command = parseCommandLine(argv, io.env);
  } catch (error) {
    if (!(error instanceof UsageError)) {
      throw error;
    }
    io.stderr.write(
      `error: ${error.message}\nTry 'tocio --help' for more information.\n`,
    );
    return 2;
  }

  if (command.kind === 'help') {
    io.stdout.write(USAGE);
    return 0;
  }
  if (command.kind === 'version') {
    io.stdout.write(`${packageJson.version}\n`);
    return 0;
  }

  try {
    await execute(command.options, command.env, io);
    return 0;
  } catch (error) {
    if (command.options.debug || !isTocError(error)) {
      throw error;
    }
    io.stderr.write(`error: ${describeError(error)}\n`);
    return 1;
  }
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: OPTIONS,
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(TocProcessError.getErrorMessage(error), {
      cause: error,
    });
  }
}

/**
 * @throws {UsageError} On unknown flags, a missing input or invalid values
 */
function parseCommandLine(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
): Command {
  const { values, positionals } = parseFlags(argv);
  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }
  if (positionals.length !== 1) {
    throw new UsageError('expected exactly one input PDF');
  }

  const options = cliOptionsSchema.safeParse({
    input: positionals[0],
    out: values.out,
    toc: values.toc,
    humanReadable: values['human-readable'],
    encoding: values.encoding,
    replaceUnsupported: values['replace-unsupported'],
    debug: values.debug,
  });
  if (!options.success) {
    throw new UsageError(formatIssues(options.error), { cause: options.error });
  }

  try {
    return { kind: 'run', options: options.data, env: loadEnvConfig(env) };
  } catch (error) {
    if (error instanceof ZodError) {
      throw new UsageError(formatIssues(error), { cause: error });
    }
    throw error;
  }
}

async function execute(
  options: CliOptions,
  env: EnvConfig,
  io: CliIO,
): Promise<void> {
  const logger = createConsoleLogger({
    level: options.debug ? 'debug' : env.TOCIO_LOG_LEVEL,
    stream: io.stderr,
  });
  const processor = new TocProcessor({
    logger,
    encoding: options.encoding,
    onUnsupportedCharacter: options.replaceUnsupported ? 'replace' : 'reject',
  });

  const document = await PdfOutlineDocument.open(options.input, { logger });

  if (options.toc === undefined && io.stdin.isTTY) {
    const text = processor.readTocText(document, {
      humanReadable: options.humanReadable,
    });
    io.stdout.write(options.humanReadable ? `${text}\n` : text);
    return;
  }

  const text =
    options.toc === undefined || options.toc === STDIN_PATH
      ? await readStream(io.stdin)
      : await readTocFile(options.toc);
  processor.writeTocText(document, text);

  const out =
    options.out ?? defaultOutputPath(options.input, env.TOCIO_OUTPUT_SUFFIX);
  await document.save(out);
  logger.info(`[tocio] Wrote ${out}`);
}

/**
 * @throws {DocumentIOError} When the file cannot be read
 */
async function readTocFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw DocumentIOError.fromError(path, 'open', error);
  }
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}
