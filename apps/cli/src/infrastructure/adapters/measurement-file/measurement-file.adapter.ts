import { readFile } from 'node:fs/promises';
import type { InputConfig } from '@usl/config';
import { InvalidMeasurementError, Measurement } from '@usl/domain';
import type { MeasurementSourcePort } from '@usl/cli/domain/ports/measurement-source.port';

export type MeasurementColumns = InputConfig['columns'];

export interface MeasurementFileOptions {
  columns: MeasurementColumns;
  delimiter: string;
  hasHeader: boolean;
}

export class MeasurementFileError extends Error {
  constructor(message: string, public readonly line?: number | undefined) {
    super(line === undefined ? message : `line ${line}: ${message}`);
    this.name = 'MeasurementFileError';
  }
}

function parseField(raw: string | undefined, lineNumber: number, column: number): number {
  const trimmed = raw?.trim() ?? '';
  const value = trimmed.length === 0 ? Number.NaN : Number(trimmed);
  if (Number.isNaN(value)) {
    throw new MeasurementFileError(`column ${column} is not a number: "${trimmed}"`, lineNumber);
  }
  return value;
}

function toMeasurement(columns: MeasurementColumns, first: number, second: number): Measurement {
  switch (columns) {
    case 'concurrency-throughput':
      return Measurement.ofConcurrencyAndThroughput(first, second);
    case 'concurrency-latency':
      return Measurement.ofConcurrencyAndLatency(first, second);
    case 'throughput-latency':
      return Measurement.ofThroughputAndLatency(first, second);
  }
}

/**
 * Parses delimited text into measurements. Blank lines and lines starting with
 * `#` are skipped; the first two columns are read, any further ones ignored.
 */
export function parseMeasurements(content: string, options: MeasurementFileOptions): Measurement[] {
  const measurements: Measurement[] = [];
  let headerPending = options.hasHeader;

  const lines = content.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const lineNumber = index + 1;
    const trimmed = lines[index].trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }
    if (headerPending) {
      headerPending = false;
      continue;
    }

    const fields = trimmed.split(options.delimiter);
    if (fields.length < 2) {
      throw new MeasurementFileError(`expected two columns separated by "${options.delimiter}"`, lineNumber);
    }

    const first = parseField(fields[0], lineNumber, 1);
    const second = parseField(fields[1], lineNumber, 2);
    try {
      measurements.push(toMeasurement(options.columns, first, second));
    } catch (error) {
      if (error instanceof InvalidMeasurementError) {
        throw new MeasurementFileError(error.message, lineNumber);
      }
      throw error;
    }
  }

  return measurements;
}

export class FileMeasurementSource implements MeasurementSourcePort {
  constructor(
    private readonly path: string,
    private readonly options: MeasurementFileOptions
  ) { }

  describe(): string {
    return this.path;
  }

  async load(): Promise<Measurement[]> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new MeasurementFileError(`Measurement file not found: ${this.path}`);
      }
      throw error;
    }
    return parseMeasurements(content, this.options);
  }
}
