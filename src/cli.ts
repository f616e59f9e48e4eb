/**
 * Command-line front end: reads a YAML or JSON document, validates it against
 * a registered record schema and reports the outcome.
 */

import { readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import * as yaml from 'yaml';
import { z } from 'zod';
import { collectViolations, validate } from './engines/record-validator.js';
import { formatErrors } from './engines/format.js';
import type { ValidatedInstance } from './engines/instance.js';
import { findSchema, recordSchemas } from './records/index.js';
import type { RecordSchema } from './types/schema.js';
import type { RecordInput, ValidationError } from './types/validation.js';
import { loadConfig, type Config } from './utils/config.js';
import {
  classifyError,
  createErrorResponse,
  ErrorCode,
  ExitCode,
  InputError,
  UsageError,
  type ExitCodeType,
} from './utils/errors.js';
import { logger } from './utils/logger.js';

export const USAGE = `Usage: record-rules <schema> <file> [--mode fail-fast|collect-all] [--format text|json]
       record-rules --list

Schemas: ${Object.keys(recordSchemas).join(', ')}`;

const DocumentSchema = z.record(z.unknown());

/**
 * Side effects the CLI performs, injectable for tests
 */
export interface CliIO {
  readFile(path: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
}

export const defaultIO: CliIO = {
  readFile: (path) => readFileSync(path, 'utf8'),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  env: process.env,
};

function parseArguments(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        mode: { type: 'string' },
        format: { type: 'string' },
        list: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
  }
}

/**
 * Read and parse an input document. YAML is a superset of JSON, so one
 * parser covers both. The top level must be a mapping.
 *
 * @throws {InputError} If the file cannot be read, parsed, or is not a mapping
 */
export function loadInput(source: string, io: Pick<CliIO, 'readFile'>): RecordInput {
  let text: string;
  try {
    text = io.readFile(source);
  } catch (error) {
    throw new InputError(source, 'file could not be read', error);
  }

  let document: unknown;
  try {
    document = yaml.parse(text);
  } catch (error) {
    throw new InputError(source, error instanceof Error ? error.message : 'malformed document', error);
  }

  const mapping = DocumentSchema.safeParse(document);
  if (!mapping.success) {
    throw new InputError(source, 'top level must be a mapping of field names to values');
  }
  return mapping.data;
}

function reportValid(instance: ValidatedInstance, config: Config, io: CliIO): ExitCodeType {
  logger.info('Record valid');
  io.stdout(
    config.outputFormat === 'json'
      ? JSON.stringify({ valid: true, record: instance.toJSON() }, null, 2)
      : `valid ${instance.schemaName}`
  );
  return ExitCode.OK;
}

function reportInvalid(errors: readonly ValidationError[], config: Config, io: CliIO): ExitCodeType {
  logger.info('Record invalid', { violations: errors.length });
  io.stdout(
    config.outputFormat === 'json'
      ? JSON.stringify({ valid: false, errors }, null, 2)
      : formatErrors(errors)
  );
  return ExitCode.INVALID_RECORD;
}

function check(schema: RecordSchema, input: RecordInput, config: Config, io: CliIO): ExitCodeType {
  if (config.mode === 'collect-all') {
    const report = collectViolations(schema, input);
    return report.valid ? reportValid(report.instance, config, io) : reportInvalid(report.errors, config, io);
  }
  const result = validate(schema, input);
  return result.valid ? reportValid(result.instance, config, io) : reportInvalid([result.error], config, io);
}

/**
 * Output format for errors raised before the configuration is loaded
 * (or because it failed to load): the flag, else a well-formed OUTPUT_FORMAT.
 */
function earlyFormat(flag: string | undefined, env: NodeJS.ProcessEnv): Config['outputFormat'] {
  const requested = flag ?? env.OUTPUT_FORMAT?.trim();
  return requested === 'json' ? 'json' : 'text';
}

function reportFailure(
  error: unknown,
  format: Config['outputFormat'],
  runId: string | undefined,
  io: CliIO
): ExitCodeType {
  const classified = classifyError(error);
  if (classified.code === ErrorCode.INTERNAL_ERROR) {
    logger.error('Unexpected failure', error, runId ? { runId } : undefined);
  }
  io.stderr(
    format === 'json'
      ? JSON.stringify(createErrorResponse(classified, runId), null, 2)
      : `error: ${classified.message}`
  );
  return classified.exitCode;
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO = defaultIO): Promise<ExitCodeType> {
  let format: Config['outputFormat'] = earlyFormat(undefined, io.env);
  let runId: string | undefined;

  try {
    const { values, positionals } = parseArguments(argv);
    format = earlyFormat(values.format, io.env);
    if (values.help) {
      io.stdout(USAGE);
      return ExitCode.OK;
    }

    const config = loadConfig(io.env, { mode: values.mode, outputFormat: values.format });
    format = config.outputFormat;
    logger.setLevel(config.logLevel);

    if (values.list) {
      io.stdout(Object.keys(recordSchemas).join('\n'));
      return ExitCode.OK;
    }

    const [schemaArg, source] = positionals;
    if (schemaArg === undefined || source === undefined || positionals.length > 2) {
      throw new UsageError(USAGE);
    }

    return await logger.withRunContext({ source }, async () => {
      runId = logger.getRunId();
      const schema = findSchema(schemaArg);
      logger.updateContext({ schemaName: schema.name });

      const input = loadInput(source, io);
      logger.debug('Validating record', undefined, { mode: config.mode, fields: Object.keys(input).length });
      const code = check(schema, input, config, io);
      logger.debug('Validation finished', undefined, { elapsedMs: logger.getElapsedMs() });
      return code;
    });
  } catch (error) {
    return reportFailure(error, format, runId, io);
  }
}
