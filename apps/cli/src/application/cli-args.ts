import { parseArgs } from 'node:util';
import { delimiterSchema, fitMethodSchema, measurementColumnsSchema } from '@usl/config';
import { z } from 'zod';

export const USAGE = `Usage: usl [options] <measurements-file> [concurrency...]

Fits the Universal Scalability Law to measured data and prints a capacity report.

Options:
  -c, --config <path>       configuration file (default: config/config.json if present)
      --columns <kind>      concurrency-throughput | concurrency-latency | throughput-latency
      --delimiter <char>    column delimiter; "tab" for tabs
      --header              first data line is a header
  -m, --method <method>     refined | linearized
  -t, --throughput <value>  predict concurrency and latency at this throughput (repeatable)
  -l, --latency <value>     predict concurrency and throughput at this latency (repeatable)
  -p, --precision <digits>  decimal places in the report
  -h, --help                show this message
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const positiveNumber = z.coerce.number().positive();

const cliArgsSchema = z.object({
  help: z.boolean(),
  file: z.string().min(1).optional(),
  concurrencyLevels: z.array(positiveNumber),
  throughputs: z.array(positiveNumber),
  latencies: z.array(positiveNumber),
  configPath: z.string().min(1).optional(),
  columns: measurementColumnsSchema.optional(),
  delimiter: delimiterSchema.optional(),
  hasHeader: z.boolean().optional(),
  method: fitMethodSchema.optional(),
  precision: z.coerce.number().int().min(0).max(12).optional(),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        config: { type: 'string', short: 'c' },
        columns: { type: 'string' },
        delimiter: { type: 'string' },
        header: { type: 'boolean' },
        method: { type: 'string', short: 'm' },
        throughput: { type: 'string', short: 't', multiple: true },
        latency: { type: 'string', short: 'l', multiple: true },
        precision: { type: 'string', short: 'p' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);
  const [file, ...levels] = positionals;

  const result = cliArgsSchema.safeParse({
    help: values.help ?? false,
    file,
    concurrencyLevels: levels,
    throughputs: values.throughput ?? [],
    latencies: values.latency ?? [],
    configPath: values.config,
    columns: values.columns,
    delimiter: values.delimiter,
    hasHeader: values.header,
    method: values.method,
    precision: values.precision,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue && issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ` : '';
    throw new CliUsageError(`${location}${issue?.message ?? 'invalid arguments'}`);
  }

  if (!result.data.help && result.data.file === undefined) {
    throw new CliUsageError('missing measurements file');
  }

  return result.data;
}
