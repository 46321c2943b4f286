#!/usr/bin/env node
import 'reflect-metadata';
import { LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { AppModule } from './app.module';
import { ConversionService } from './conversion';
import {
  SOURCE_FORMATS,
  isSourceFormat,
} from './conversion/readers/source-reader.interface';
import { bootstrap } from './main';

type CliOptions = {
  input?: string;
  output?: string;
  format?: string;
  mapping?: string;
  sourceName?: string;
  serve?: boolean;
  host?: string;
  port?: number;
  verbose?: boolean;
};

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export function validateFormat(value: string): string {
  const tag = value.trim().toLowerCase();
  if (isSourceFormat(tag)) {
    return tag;
  }
  throw new InvalidArgumentError(
    `Format must be one of: ${SOURCE_FORMATS.join(', ')}.`,
  );
}

export function validatePort(value: string): number {
  const port = Number(value);
  if (/^\d+$/.test(value) && port >= 1 && port <= 65535) {
    return port;
  }
  throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
}

export function buildProgram(io: CliIo = processIo): Command {
  return new Command()
    .name('meter-import')
    .description(
      'Normalize meter reading exports (CSV, TXT, TSV, JSON, XLSX) into the universal reading schema',
    )
    .option('-i, --input <path>', 'source file')
    .option('-o, --output <path>', 'output file (.csv, .txt, .xlsx or .exl)')
    .option(
      '-f, --format <tag>',
      'source format; defaults to the input extension',
      validateFormat,
    )
    .option(
      '-m, --mapping <path>',
      'JSON field mapping; inferred from the headers when omitted',
    )
    .option(
      '-s, --source-name <name>',
      'default source_system value (else DEFAULT_SOURCE_NAME, else "unknown")',
    )
    .option('--serve', 'start the HTTP API instead of running a file job')
    .option('--host <host>', 'HTTP API host')
    .option('--port <port>', 'HTTP API port', validatePort)
    .option('-v, --verbose', 'log pipeline progress')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

/**
 * Run the command line tool and resolve to its exit code.
 *
 * In `--serve` mode the returned promise resolves once the server listens;
 * the process then stays alive on the open server.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = processIo,
): Promise<number> {
  const program = buildProgram(io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const logLevels: LogLevel[] = options.verbose
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn'];

  if (options.serve) {
    await bootstrap({ host: options.host, port: options.port, logLevels });
    return 0;
  }

  if (!options.input || !options.output) {
    io.stderr(
      'Import error: --input and --output are required unless --serve is given\n',
    );
    return 1;
  }

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevels,
  });
  try {
    const result = await app.get(ConversionService).convertFile({
      inputPath: options.input,
      outputPath: options.output,
      format: options.format,
      mappingPath: options.mapping,
      sourceName: options.sourceName,
    });
    io.stdout(
      `${result.rowsWritten}/${result.rowsRead} rows normalized -> ${result.outputPath}\n`,
    );
    return 0;
  } catch (error) {
    io.stderr(
      `Import error: ${error instanceof Error ? error.message : String(error)}\n`,
    );
    return 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(
        `Import error: ${error instanceof Error ? error.message : String(error)}\n`,
      );
      process.exitCode = 1;
    },
  );
}
