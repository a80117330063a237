/**
 * Reconciliation Tests
 */

import { reconcile, type BasicInfo } from '@resume-parser/shared';

const BASIC_INFO: BasicInfo = {
  name: 'John Doe',
  email: 'john@x.com',
  phone: null,
  raw_text: 'John Doe\njohn@x.com',
};

describe('reconcile', () => {
  it('should backfill absent canonical keys from BasicInfo', () => {
    expect(reconcile({ Skills: { Languages: ['Python'] } }, BASIC_INFO)).toEqual({
      Skills: { Languages: ['Python'] },
      name: 'John Doe',
      email: 'john@x.com',
      phone: null,
      raw_text: 'John Doe\njohn@x.com',
    });
  });

  it('should keep a present key even when its value is null', () => {
    const result = reconcile({ email: null }, BASIC_INFO);
    expect(result.email).toBeNull();
    expect(Object.prototype.hasOwnProperty.call(result, 'email')).toBe(true);
  });

  it('should not overwrite values produced by the model', () => {
    const result = reconcile(
      { name: 'Johnathan Doe', phone: '555-000-1111', raw_text: 'model text' },
      BASIC_INFO
    );
    expect(result).toEqual({
      name: 'Johnathan Doe',
      phone: '555-000-1111',
      raw_text: 'model text',
      email: 'john@x.com',
    });
  });

  it('should backfill a null phone as an explicit null key', () => {
    const result = reconcile({}, BASIC_INFO);
    expect(Object.keys(result).sort()).toEqual(['email', 'name', 'phone', 'raw_text']);
    expect(result.phone).toBeNull();
  });

  it('should not mutate its inputs', () => {
    const structured = { Education: [] };
    const basicInfo = { ...BASIC_INFO };

    const result = reconcile(structured, basicInfo);

    expect(result).not.toBe(structured);
    expect(structured).toEqual({ Education: [] });
    expect(basicInfo).toEqual(BASIC_INFO);
  });
});
