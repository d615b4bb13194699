import { logger, setLogLevel } from './logging';

describe('setLogLevel', () => {
  const initial = logger.level;
  afterEach(() => {
    logger.level = initial;
  });

  it('applies the configured level to the logger and later children', () => {
    setLogLevel('debug');
    expect(logger.level).toBe('debug');
    expect(logger.child({ component: 'coach' }).level).toBe('debug');
  });
});
