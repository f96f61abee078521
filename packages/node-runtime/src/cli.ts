#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, Option } from 'commander';
import { existsSync, createWriteStream } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import {
  createFormat,
  createLogger,
  FormatRegistry,
  rawCodec,
  toVerbosity,
  concat,
  type FormatDescriptor,
  type Logger,
} from '../../core/src/index.js';
import { createEnvelope, Envelope } from './index.js';
import { FileByteSink, FileByteSource } from './file.js';
import { endWritable, fromNodeWritable } from './streamAdapter.js';
import { FilesystemError } from '../../core/src/errors/index.js';

const PKG_VERSION = '0.1.0'; // sync with root package.json

type GlobalOpts = {
  format?          : string;
  maxVersionLength?: number;
  verbose          : number;
};

function fail(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

function positiveInt(label: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isInteger(n) || n < 1) throw new Error(`${label} must be a positive integer`);
    return n;
  };
}

function nonNegativeInt(label: string) {
  return (v: string): number => {
    const n = Number(v);
    if (!Number.isInteger(n) || n < 0) throw new Error(`${label} must be a non-negative integer`);
    return n;
  };
}

const program = new Command();

program
  .name('envelope')
  .version(PKG_VERSION)
  .description('Pack, unpack and inspect versioned binary envelopes')

  .addOption(
    new Option('-F, --format <version>', 'format version to write and accept')
  )
  .addOption(
    new Option('-m, --max-version-length <bytes>', 'capacity of the version field')
      .argParser(positiveInt('Max version length'))
  )
  // verbosity (repeatable)
  .addOption(
    new Option('-v, --verbose', 'increase verbosity (use multiple times)')
      .default(0)
      .argParser((_: string, previous: number) => previous + 1)
  );

function globals(): { format: FormatDescriptor; log: Logger } {
  const opts = program.opts<GlobalOpts>();
  const log  = createLogger(toVerbosity(opts.verbose), msg => stderr.write(msg + '\n'), 'cli');

  let format: FormatDescriptor;
  if (opts.maxVersionLength === undefined && (opts.format === undefined || FormatRegistry.has(opts.format))) {
    format = opts.format === undefined ? FormatRegistry.current : FormatRegistry.get(opts.format);
  } else {
    const base = FormatRegistry.current;
    format = createFormat(opts.format ?? base.version, opts.maxVersionLength ?? base.maxVersionLength);
  }
  log.log(2, `Format ${format.version}, version field ${format.maxVersionLength} bytes`);
  return { format, log };
}

async function readAllFromStdin(): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  for await (const c of stdin) {
    chunks.push(typeof c === 'string' ? new TextEncoder().encode(c) : new Uint8Array(c));
  }
  return concat(...chunks);
}

async function openSource(src: string): Promise<FileByteSource> {
  if (!existsSync(src)) throw new FilesystemError(`Input file not found: ${src}`);
  return FileByteSource.open(src);
}

/* ------------------------------------------------------------------ */
/*  pack                                                               */
/* ------------------------------------------------------------------ */
program
  .command('pack [src]')
  .description('Wrap raw bytes as one envelope; omit src or use - to read STDIN')
  .option('-o, --out <file>', 'output file (default STDOUT)', '-')
  .option('-a, --append', 'append to the output file instead of replacing it', false)
  .action(async (src: string | undefined, cmd: { out: string; append: boolean }) => {
    const { format, log } = globals();
    const env  = createEnvelope(rawCodec, { format, verbose: log.level, logger: msg => stderr.write(msg + '\n') });
    const data = !src || src === '-' ? await readAllFromStdin() : await readFile(src);
    const payload = new Uint8Array(data);

    if (cmd.out === '-') {
      const out = fromNodeWritable(stdout);
      const n = await env.write(out, payload);
      log.log(1, `Packed ${payload.length} payload bytes into ${n} bytes`);
      return;
    }

    const sink = await FileByteSink.open(cmd.out, !cmd.append);
    try {
      const offset = cmd.append ? await sink.size() : 0;
      const n = await env.writeAt(sink, offset, payload);
      log.log(1, `Packed ${payload.length} payload bytes into ${n} bytes at offset ${offset}`);
    } finally {
      await sink.close();
    }
  });

/* ------------------------------------------------------------------ */
/*  unpack                                                             */
/* ------------------------------------------------------------------ */
program
  .command('unpack <src>')
  .description('Write the payload of one envelope; --out - for STDOUT')
  .option('-i, --index <n>', 'which envelope, counting from 0', nonNegativeInt('Index'), 0)
  .option('-o, --out <file>', 'output file (default STDOUT)', '-')
  .action(async (src: string, cmd: { index: number; out: string }) => {
    const { format, log } = globals();
    const env    = createEnvelope(rawCodec, { format, verbose: log.level, logger: msg => stderr.write(msg + '\n') });
    const source = await openSource(src);

    let payload: Uint8Array;
    try {
      const all = await Envelope.inspect(source, format);
      const hit = all[cmd.index];
      if (!hit) throw new Error(`No envelope at index ${cmd.index} (file holds ${all.length})`);
      payload = (await env.readAt(source, hit.offset)).value;
      log.log(1, `Envelope ${cmd.index} at ${hit.offset}: ${payload.length} payload bytes`);
    } finally {
      await source.close();
    }

    const out = cmd.out === '-' ? stdout : createWriteStream(cmd.out);
    await fromNodeWritable(out).write(payload);
    if (out !== stdout) await endWritable(out);
  });

/* ------------------------------------------------------------------ */
/*  inspect                                                            */
/* ------------------------------------------------------------------ */
program
  .command('inspect <src>')
  .description('Print the header of every envelope in a file as JSON')
  .action(async (src: string) => {
    const { format, log } = globals();
    const source = await openSource(src);
    try {
      const all = await Envelope.inspect(source, format);
      log.log(1, `${all.length} envelopes in ${source.length} bytes`);
      const rows = all.map(({ offset, header }) => ({
        offset,
        version   : header.version,
        headerSize: header.headerSize,
        dataSize  : header.dataSize,
      }));
      stdout.write(JSON.stringify(rows, null, 2) + '\n');
    } finally {
      await source.close();
    }
  });

process.on('uncaughtException', fail);
process.on('unhandledRejection', fail);

program.parseAsync(process.argv).catch(fail);
