import { Command, InvalidArgumentError } from 'commander';
import { CellLanguage, DETECTABLE_LANGUAGES, isCellLanguage } from './types';
import { CLI_NAME, VERSION } from './constants';
import { CliConfig } from './config';
import { MissingContentError } from './errors';
import { parseNotebook, serializeNotebook } from './parser';
import { parseNotebookJson, toJSON } from './jsonCodec';
import { deleteCell, getCell, insertCell, updateCell } from './operations';
import { diffNotebooks } from './cellMatcher';
import { ipynbToSource, sourceToIpynb } from './ipynbConverter';
import { getLogger } from './logger';

const log = getLogger('cli');

/**
 * Where commands read input and write output.
 * A missing path (or `-`) means standard input / standard output.
 */
export interface CliIO {
  readText(path: string | undefined): Promise<string>;
  writeText(text: string, path: string | undefined): Promise<void>;
}

interface OutputOptions {
  output?: string;
}

interface HeaderOptions extends OutputOptions {
  header?: boolean;
}

interface IndentOptions extends OutputOptions {
  indent?: number;
}

interface GetOptions extends IndentOptions {
  json?: boolean;
}

interface EditOptions extends HeaderOptions {
  content?: string;
  contentFile?: string;
  language?: CellLanguage;
}

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not a cell index.');
  }
  return Number(value);
}

function parseLanguage(value: string): CellLanguage {
  if (!isCellLanguage(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DETECTABLE_LANGUAGES.join(', ')}.`);
  }
  return value;
}

function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 8) {
    throw new InvalidArgumentError('Expected an integer from 0 to 8.');
  }
  return indent;
}

/**
 * Register all notebook commands on `program`
 */
export function registerCommands(program: Command, io: CliIO, config: CliConfig): void {
  const includeHeader = (options: HeaderOptions): boolean => options.header ?? config.includeHeader;
  const indent = (options: IndentOptions): number => options.indent ?? config.jsonIndent;

  const emit = async (text: string, options: OutputOptions): Promise<void> => {
    log.info('writing %d characters to %s', text.length, options.output ?? 'stdout');
    await io.writeText(`${text}\n`, options.output);
  };

  const readCells = async (file: string | undefined) => {
    const cells = parseNotebook(await io.readText(file));
    log.info('read %d cells from %s', cells.length, file ?? 'stdin');
    return cells;
  };

  const resolveContent = async (options: EditOptions, operation: string): Promise<string> => {
    if (options.content !== undefined) {
      return options.content;
    }
    if (options.contentFile !== undefined) {
      return io.readText(options.contentFile);
    }
    throw new MissingContentError(operation);
  };

  const withOutput = (command: Command): Command =>
    command.option('-o, --output <path>', 'write the result to a file instead of stdout');

  const withHeader = (command: Command): Command =>
    withOutput(command)
      .option('--header', 'start the source with the Databricks header')
      .option('--no-header', 'leave out the Databricks header');

  const withIndent = (command: Command): Command =>
    withOutput(command).option('--indent <n>', 'JSON indentation', parseIndent);

  const withContent = (command: Command): Command =>
    withHeader(command)
      .option('-c, --content <text>', 'new cell content')
      .option('-f, --content-file <path>', 'read the new cell content from a file')
      .option('-l, --language <language>', 'wrap the content as a magic cell of this language', parseLanguage);

  withIndent(program.command('parse'))
    .description('convert notebook source to JSON')
    .argument('[file]', 'notebook source (default: stdin)')
    .action(async (file: string | undefined, options: IndentOptions) => {
      const cells = await readCells(file);
      await emit(JSON.stringify(toJSON(cells), null, indent(options)), options);
    });

  withHeader(program.command('render'))
    .description('convert notebook JSON to source')
    .argument('[file]', 'notebook JSON (default: stdin)')
    .action(async (file: string | undefined, options: HeaderOptions) => {
      const cells = parseNotebookJson(await io.readText(file));
      await emit(serializeNotebook(cells, includeHeader(options)), options);
    });

  withIndent(program.command('get'))
    .description('print the content of a cell')
    .argument('<index>', 'cell index', parseIndex)
    .argument('[file]', 'notebook source (default: stdin)')
    .option('--json', 'print the cell as JSON')
    .action(async (index: number, file: string | undefined, options: GetOptions) => {
      const cell = getCell(await readCells(file), index);
      await emit(options.json ? JSON.stringify(cell, null, indent(options)) : cell.content, options);
    });

  withContent(program.command('update'))
    .description('replace the content of a cell')
    .argument('<index>', 'cell index', parseIndex)
    .argument('[file]', 'notebook source (default: stdin)')
    .action(async (index: number, file: string | undefined, options: EditOptions) => {
      const cells = await readCells(file);
      const content = await resolveContent(options, 'update');
      const updated = updateCell(cells, index, content, options.language);
      await emit(serializeNotebook(updated, includeHeader(options)), options);
    });

  withContent(program.command('insert'))
    .description('insert a cell before <index> (the cell count appends)')
    .argument('<index>', 'cell index', parseIndex)
    .argument('[file]', 'notebook source (default: stdin)')
    .action(async (index: number, file: string | undefined, options: EditOptions) => {
      const cells = await readCells(file);
      const content = await resolveContent(options, 'insert');
      const inserted = insertCell(cells, index, content, options.language);
      await emit(serializeNotebook(inserted, includeHeader(options)), options);
    });

  withHeader(program.command('delete'))
    .description('delete a cell')
    .argument('<index>', 'cell index', parseIndex)
    .argument('[file]', 'notebook source (default: stdin)')
    .action(async (index: number, file: string | undefined, options: HeaderOptions) => {
      const remaining = deleteCell(await readCells(file), index);
      await emit(serializeNotebook(remaining, includeHeader(options)), options);
    });

  withIndent(program.command('diff'))
    .description('match the cells of two notebook versions by content')
    .argument('<old>', 'previous notebook source')
    .argument('<new>', 'current notebook source')
    .action(async (oldFile: string, newFile: string, options: IndentOptions) => {
      const diff = diffNotebooks(await readCells(oldFile), await readCells(newFile));
      await emit(JSON.stringify(diff, null, indent(options)), options);
    });

  withOutput(program.command('to-ipynb'))
    .description('convert notebook source to a Jupyter notebook')
    .argument('[file]', 'notebook source (default: stdin)')
    .action(async (file: string | undefined, options: OutputOptions) => {
      await emit(sourceToIpynb(await io.readText(file)), options);
    });

  withHeader(program.command('from-ipynb'))
    .description('convert a Jupyter notebook to notebook source')
    .argument('[file]', 'Jupyter notebook (default: stdin)')
    .action(async (file: string | undefined, options: HeaderOptions) => {
      await emit(ipynbToSource(await io.readText(file), includeHeader(options)), options);
    });
}

/**
 * Build the `nbsource` program
 */
export function createProgram(io: CliIO, config: CliConfig): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description('Read and edit Databricks notebook source files cell by cell')
    .version(VERSION, '-v, --version');

  registerCommands(program, io, config);
  return program;
}
