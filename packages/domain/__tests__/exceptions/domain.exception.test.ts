import { describe, expect, it } from 'vitest';
import { Code, DomainException } from '../../src/exceptions';

describe('DomainException', () => {
  it('should use the code message by default', () => {
    const exception = DomainException.new({ code: Code.DATASET_EMPTY_ERROR });

    expect(exception).toBeInstanceOf(Error);
    expect(exception.name).toBe('DomainException');
    expect(exception.code).toBe(422);
    expect(exception.message).toBe('Dataset is empty.');
    expect(exception.data).toBeUndefined();
  });

  it('should carry an override message and a payload', () => {
    const exception = DomainException.new({
      code: Code.READ_ONLY_QUERY_ERROR,
      overrideMessage: 'Multiple statements are not allowed.',
      data: { statements: 2 },
    });

    expect(exception.code).toBe(403);
    expect(exception.message).toBe('Multiple statements are not allowed.');
    expect(exception.data).toEqual({ statements: 2 });
  });
});
