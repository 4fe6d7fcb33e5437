import { describe, expect, it } from 'vitest';
import { actor } from '../../src/identity/Actor';

describe('actor', () => {
  it('wraps the user id and collects permissions', () => {
    const judge = actor(10, 'Jules', ['judge_submissions', 'judge_submissions']);

    expect(judge.userId.unwrap()).toBe(10);
    expect([...judge.permissions]).toEqual(['judge_submissions']);
  });

  it('rejects invalid ids and blank names', () => {
    expect(() => actor(0, 'Jules')).toThrow();
    expect(() => actor(1.5, 'Jules')).toThrow();
    expect(() => actor(10, '  ')).toThrow();
  });
});
