import { pagePointKey, pointIdFromKey } from './point-id';

describe('pointIdFromKey', () => {
  it('is stable for the same key', () => {
    expect(pointIdFromKey('doc-1_page_3')).toBe(pointIdFromKey('doc-1_page_3'));
  });

  it('stays within the safe integer range', () => {
    for (const key of ['a', 'doc-1_page_3', 'unknown_page_0']) {
      const id = pointIdFromKey(key);
      expect(Number.isSafeInteger(id)).toBe(true);
      expect(id).toBeGreaterThanOrEqual(0);
    }
  });

  it('differs between pages', () => {
    expect(pointIdFromKey('doc-1_page_3')).not.toBe(pointIdFromKey('doc-1_page_4'));
  });
});

describe('pagePointKey', () => {
  it('joins document id and page number', () => {
    expect(pagePointKey('doc-1', 3)).toBe('doc-1_page_3');
  });
});
