import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, describeError } from './logger';

function captureStdout() {
  return vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
}

describe('Logger', () => {
  let write: ReturnType<typeof captureStdout>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00.000Z'));
    write = captureStdout();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  function lines(): unknown[] {
    return write.mock.calls.map((call) => JSON.parse(String(call[0])));
  }

  it('should write one JSON line per entry', () => {
    new Logger('info').info('Webhook accepted', { deliveryId: 'd1' });
    expect(write).toHaveBeenCalledWith(
      '{"timestamp":"2024-05-01T12:00:00.000Z","level":"info","msg":"Webhook accepted","deliveryId":"d1"}\n',
    );
  });

  it('should drop entries below the level', () => {
    const logger = new Logger('warn');
    logger.info('quiet');
    logger.error('loud');
    expect(lines()).toEqual([{ timestamp: '2024-05-01T12:00:00.000Z', level: 'error', msg: 'loud' }]);
  });

  it('should carry child bindings and share level changes', () => {
    const logger = new Logger('info');
    const child = logger.child({ component: 'intake' });

    child.debug('hidden');
    logger.setLevel('debug');
    child.debug('shown', { status: 404 });

    expect(lines()).toEqual([
      { timestamp: '2024-05-01T12:00:00.000Z', level: 'debug', msg: 'shown', component: 'intake', status: 404 },
    ]);
  });
});

describe('describeError', () => {
  it('should keep message and name of errors', () => {
    const err = new TypeError('bad');
    expect(describeError(err)).toMatchObject({ error: 'bad', errorName: 'TypeError' });
  });

  it('should stringify other values', () => {
    expect(describeError(42)).toEqual({ error: '42' });
  });
});
