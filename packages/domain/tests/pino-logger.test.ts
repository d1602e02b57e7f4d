import pino from 'pino';
import { createChildLogger, createPinoLogger, isLogLevel, PinoLogger } from '../src';

function createCapturingLogger(traceErrors = false): { logger: PinoLogger; records: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  const destination = { write: (line: string) => lines.push(line) };
  const logger = new PinoLogger({ name: 'test', level: 'info', traceErrors }, pino({ level: 'info' }, destination));
  return { logger, records: () => lines.map((line) => JSON.parse(line)) };
}

describe('PinoLogger', () => {
  it('writes the message with its context', () => {
    const { logger, records } = createCapturingLogger();

    logger.info('Model fitted', { sigma: 0.1 });

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({ level: 30, msg: 'Model fitted', sigma: 0.1 });
  });

  it('drops messages below the configured level until it is lowered', () => {
    const { logger, records } = createCapturingLogger();

    logger.debug('hidden');
    logger.setLevel('debug');
    logger.debug('shown');

    expect(records().map((record) => record.msg)).toEqual(['shown']);
    expect(logger.getLevel()).toBe('debug');
  });

  it('logs only the error message unless stack traces are enabled', () => {
    const plain = createCapturingLogger();
    const traced = createCapturingLogger(true);
    const error = new Error('boom');

    plain.logger.error('Run failed', error, { file: 'run.csv' });
    traced.logger.fatal('Run failed', error);

    expect(plain.records()[0]).toMatchObject({ level: 50, file: 'run.csv', err: { message: 'boom' } });
    expect(plain.records()[0].err).not.toHaveProperty('stack', error.stack);
    expect(traced.records()[0]).toMatchObject({ level: 60, err: { message: 'boom', stack: error.stack } });
  });

  it('gives children their bindings and the parent level', () => {
    const { logger, records } = createCapturingLogger();

    const child = logger.child({ name: 'model-fitting' });
    child.warn('Refinement did not converge within the iteration limit');

    expect(child.getLevel()).toBe('info');
    expect(records()[0]).toMatchObject({ level: 40, name: 'model-fitting' });
  });
});

describe('createChildLogger', () => {
  it('uses the level of the most recently created root', () => {
    createPinoLogger({ name: 'usl', logLevel: 'error', prettyPrint: false });

    expect(createChildLogger('cli').getLevel()).toBe('error');
  });
});

describe('isLogLevel', () => {
  it('accepts pino level names only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
  });
});
