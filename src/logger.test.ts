describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    jest.resetModules();
    delete process.env.LOG_LEVEL;
  });

  afterAll(() => {
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('logs at info under the service name by default', async () => {
    const { default: logger } = await import('./logger');

    expect(logger.level).toBe('info');
    expect(logger.defaultMeta).toEqual({ service: 'olm-metrics-sync' });
  });

  it('takes the level from LOG_LEVEL', async () => {
    process.env.LOG_LEVEL = 'debug';

    const { default: logger } = await import('./logger');

    expect(logger.level).toBe('debug');
  });

  it('falls back to info for an unknown level', async () => {
    process.env.LOG_LEVEL = 'chatty';

    const { default: logger } = await import('./logger');

    expect(logger.level).toBe('info');
  });

  it('counts logged lines per level', async () => {
    const { default: logger } = await import('./logger');
    const { METRICS } = await import('./metrics');

    logger.warn('catalog source unreachable');
    logger.warn('catalog source unreachable');
    logger.debug('below the logger level');
    await new Promise(resolve => setImmediate(resolve));

    const values = (await METRICS.LOGS_COUNT.get()).values;
    expect(values.find(value => value.labels.level === 'warn')?.value).toBe(2);
    expect(values.find(value => value.labels.level === 'debug')).toBeUndefined();
  });
});
