import type { LoggerMethods } from '@ocrean/logger';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { TextNormalizer } from '../normalizer/text-normalizer';
import { VocabularyExtractor } from './vocabulary-extractor';

describe('VocabularyExtractor', () => {
  let mockLogger: LoggerMethods;
  let extractor: VocabularyExtractor;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    extractor = new VocabularyExtractor({
      normalizer: new TextNormalizer({ logger: mockLogger }),
    });
  });

  test('honor the minimum length', () => {
    const text = '옷 하나 옷 둘 마음 마음가짐';

    expect(extractor.extract(text, 1)).toEqual([
      '둘',
      '마음',
      '마음가짐',
      '옷',
      '하나',
    ]);
    expect(extractor.extract(text, 3)).toEqual(['마음가짐']);
  });

  test('default minimum length is 1', () => {
    expect(extractor.extract('옷 옷')).toEqual(['옷']);
  });

  test('non-positive and non-finite minimum lengths count as 1', () => {
    const text = '가 나다';

    expect(extractor.extract(text, 0)).toEqual(['가', '나다']);
    expect(extractor.extract(text, -5)).toEqual(['가', '나다']);
    expect(extractor.extract(text, Number.NaN)).toEqual(['가', '나다']);
  });

  test('fractional minimum lengths round up', () => {
    expect(extractor.extract('가 나다 라마바', 1.5)).toEqual(['나다', '라마바']);
  });

  test('only Hangul syllable runs are extracted', () => {
    expect(
      extractor.extract('OCR결과: 한국어123텍스트, English ㄱㄴㄷ 漢字 말.'),
    ).toEqual(['결과', '말', '텍스트', '한국어']);
  });

  test('output is sorted, unique and deterministic', () => {
    const text = '하늘 바다 하늘 가을 바다';
    const first = extractor.extract(text);
    const second = extractor.extract(text);

    expect(first).toEqual(['가을', '바다', '하늘']);
    expect(second).toEqual(first);
    expect(new Set(first).size).toBe(first.length);
  });

  test('escaped newlines split words', () => {
    expect(extractor.extract('첫째\\n둘째')).toEqual(['둘째', '첫째']);
  });

  test('empty input returns empty array for any minimum length', () => {
    expect(extractor.extract('')).toEqual([]);
    expect(extractor.extract('', 5)).toEqual([]);
    expect(extractor.extract(null, 0)).toEqual([]);
  });

  describe('resolveMinLength', () => {
    test('clamp to whole numbers of at least 1', () => {
      expect(VocabularyExtractor.resolveMinLength(3)).toBe(3);
      expect(VocabularyExtractor.resolveMinLength(0)).toBe(1);
      expect(VocabularyExtractor.resolveMinLength(2.1)).toBe(3);
      expect(VocabularyExtractor.resolveMinLength(Number.POSITIVE_INFINITY)).toBe(1);
    });
  });
});
