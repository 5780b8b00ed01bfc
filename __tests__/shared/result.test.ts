import { describe, test, expect } from 'vitest';
import { Ok, Err, map, flatMap, match, type Result } from '../../src/shared/types/index.js';

describe('Result型', () => {
  const ok: Result<number, string> = Ok(2);
  const err: Result<number, string> = Err('boom');

  test('map は成功値のみ変換する', () => {
    expect(map(ok, (n) => n * 2)).toEqual({ success: true, data: 4 });
    expect(map(err, (n) => n * 2)).toBe(err);
  });

  test('flatMap は最初の失敗で止まる', () => {
    const half = (n: number): Result<number, string> => (n % 2 === 0 ? Ok(n / 2) : Err('odd'));

    expect(flatMap(ok, half)).toEqual({ success: true, data: 1 });
    expect(flatMap(flatMap(ok, half), half)).toEqual({ success: false, error: 'odd' });
    expect(flatMap(err, half)).toBe(err);
  });

  test('match は成功・失敗で分岐する', () => {
    const render = (result: Result<number, string>) =>
      match(result, { success: (n) => `ok:${n}`, error: (e) => `err:${e}` });

    expect(render(ok)).toBe('ok:2');
    expect(render(err)).toBe('err:boom');
  });
});
