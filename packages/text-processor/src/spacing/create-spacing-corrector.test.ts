import type { LoggerMethods } from '@ocrean/logger';
import type { SpawnSyncReturns } from 'node:child_process';

import { spawnSync } from 'node:child_process';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import { TextNormalizer } from '../normalizer/text-normalizer';
import { createSpacingCorrector } from './create-spacing-corrector';
import { LazySpacingCorrector } from './lazy-spacing-corrector';
import { NoopSpacingCorrector } from './spacing-corrector';

vi.mock('node:child_process', () => ({
  spawnSync: vi.fn(),
}));

const spawnSyncMock = vi.mocked(spawnSync);

function createResult(
  stdout: string,
  status: number | null = 0,
): SpawnSyncReturns<string> {
  return {
    pid: 1234,
    output: [null, stdout, ''],
    stdout,
    stderr: '',
    status,
    signal: null,
  };
}

describe('createSpacingCorrector', () => {
  let mockLogger: LoggerMethods;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  test('returns the no-op corrector when disabled', () => {
    const corrector = createSpacingCorrector(
      { enabled: false, command: 'kospacing' },
      mockLogger,
    );

    expect(corrector).toBeInstanceOf(NoopSpacingCorrector);
    expect(mockLogger.warn).not.toHaveBeenCalled();
  });

  test('returns the no-op corrector and warns when no command is set', () => {
    const corrector = createSpacingCorrector({ enabled: true }, mockLogger);

    expect(corrector).toBeInstanceOf(NoopSpacingCorrector);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[createSpacingCorrector] Spacing enabled but no command configured, using no-op corrector',
    );
  });

  test('returns a lazy corrector that has not spawned anything yet', () => {
    const corrector = createSpacingCorrector(
      { enabled: true, command: 'kospacing', args: ['-q'], timeoutMs: 100 },
      mockLogger,
    );

    expect(corrector).toBeInstanceOf(LazySpacingCorrector);
    expect(
      corrector instanceof LazySpacingCorrector && corrector.isInitialized(),
    ).toBe(false);
    expect(spawnSyncMock).not.toHaveBeenCalled();
  });

  test('checks the command once with a sample run before using it', () => {
    spawnSyncMock
      .mockReturnValueOnce(createResult('띄어쓰기 확인\n'))
      .mockReturnValueOnce(createResult('아버지가 방에 들어가신다\n'));
    const corrector = createSpacingCorrector(
      { enabled: true, command: 'kospacing' },
      mockLogger,
    );

    expect(corrector.correct('아버지가방에들어가신다')).toBe(
      '아버지가 방에 들어가신다',
    );
    expect(spawnSyncMock).toHaveBeenCalledTimes(2);
    expect(spawnSyncMock).toHaveBeenNthCalledWith(
      1,
      'kospacing',
      [],
      expect.objectContaining({ input: '띄어쓰기확인' }),
    );
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[LazySpacingCorrector] Spacing corrector initialized',
    );
  });

  test('falls back to no-op once when the command cannot be spawned', () => {
    spawnSyncMock.mockReturnValue({
      ...createResult('', null),
      error: new Error('spawnSync /nonexistent/ocrean-spacing ENOENT'),
    });
    const corrector = createSpacingCorrector(
      { enabled: true, command: '/nonexistent/ocrean-spacing' },
      mockLogger,
    );
    const normalizer = new TextNormalizer({
      logger: mockLogger,
      spacingCorrector: corrector,
    });

    expect(normalizer.normalize('띄어쓰기 없는  문장')).toBe('띄어쓰기 없는 문장');
    expect(normalizer.normalize('둘째 문장')).toBe('둘째 문장');
    expect(normalizer.normalize('셋째 문장')).toBe('셋째 문장');

    expect(spawnSyncMock).toHaveBeenCalledTimes(1);
    expect(mockLogger.info).not.toHaveBeenCalled();
    expect(mockLogger.warn).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[LazySpacingCorrector] Initialization failed, spacing correction disabled:',
      'Spacing command "/nonexistent/ocrean-spacing" failed: spawnSync /nonexistent/ocrean-spacing ENOENT',
    );
  });
});
