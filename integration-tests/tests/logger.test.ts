/**
 * Structured logger
 */

import { logger, contextForDocument, runWithContextAsync } from '@ce-intake/shared';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;
  let logSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (originalLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLevel;
    }
  });

  it('should write one JSON line carrying the job context', async () => {
    process.env.LOG_LEVEL = 'info';
    const context = contextForDocument('corr-1', {
      document_id: 'doc-1',
      source_filename: 'ethics.pdf',
      media_type: 'application/pdf',
    });

    await runWithContextAsync(context, async () => {
      logger.info('Certificate verified', { credits: 2 });
    });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry).toEqual({
      timestamp: expect.any(String),
      level: 'INFO',
      correlationId: 'corr-1',
      documentId: 'doc-1',
      sourceFilename: 'ethics.pdf',
      message: 'Certificate verified',
      credits: 2,
    });
  });

  it('should generate a correlation id outside a context', () => {
    process.env.LOG_LEVEL = 'info';
    logger.info('No context');

    const entry = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(entry.correlationId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  it('should drop messages below the configured level', () => {
    process.env.LOG_LEVEL = 'info';
    logger.debug('Certificate fields parsed');
    expect(debugSpy).not.toHaveBeenCalled();

    process.env.LOG_LEVEL = 'debug';
    logger.debug('Certificate fields parsed');
    expect(debugSpy).toHaveBeenCalledTimes(1);
  });

  it('should serialize errors', () => {
    process.env.LOG_LEVEL = 'error';
    logger.error('Job failed', new Error('boom'), { jobId: '7' });

    const entry = JSON.parse(String(errorSpy.mock.calls[0][0]));
    expect(entry.jobId).toBe('7');
    expect(entry.error).toEqual({ message: 'boom', name: 'Error', stack: expect.any(String) });
  });

  it('should write nothing when silent', () => {
    process.env.LOG_LEVEL = 'silent';
    logger.info('hidden');
    logger.error('hidden', new Error('boom'));
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });
});
