import { ConsoleLogger } from '../../src/infrastructure/common/ConsoleLogger';

describe('ConsoleLogger', () => {
  let infoSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix messages with timestamp and level', () => {
    new ConsoleLogger('info').info('Ready', { count: 2 });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    expect(infoSpy.mock.calls[0][0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] Ready \{"count":2\}$/);
  });

  it('should omit empty metadata', () => {
    new ConsoleLogger('info').info('Ready');

    expect(infoSpy.mock.calls[0][0]).toMatch(/ \[INFO\] Ready$/);
  });

  it('should merge child context into the metadata', () => {
    const logger = new ConsoleLogger('info').child({ collection: 'items' });

    logger.info('Created', { id: 3 });

    expect(infoSpy.mock.calls[0][0]).toMatch(/ \[INFO\] Created \{"collection":"items","id":3\}$/);
  });

  it('should let call metadata override child context', () => {
    const logger = new ConsoleLogger('info').child({ collection: 'items' });

    logger.info('Moved', { collection: 'cards' });

    expect(infoSpy.mock.calls[0][0]).toMatch(/ Moved \{"collection":"cards"\}$/);
  });

  it('should drop messages below the configured level', () => {
    new ConsoleLogger('info').debug('hidden');
    new ConsoleLogger('debug').child({ collection: 'items' }).debug('shown');

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(debugSpy.mock.calls[0][0]).toMatch(/ \[DEBUG\] shown \{"collection":"items"\}$/);
  });

  it('should attach the error message to error logs', () => {
    new ConsoleLogger('error').error('Shift failed', new Error('disk full'));

    expect(errorSpy.mock.calls[0][0]).toContain('[ERROR] Shift failed {"error":"disk full"');
  });
});
