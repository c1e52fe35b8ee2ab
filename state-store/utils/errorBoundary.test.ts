import { afterEach, describe, expect, it, vi } from 'vitest';
import { ErrorBoundary, describeError, toError } from './errorBoundary.ts';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('errorBoundary', () => {
  it('toError는 Error를 그대로 두고 다른 값은 감싼다', () => {
    const error = new Error('original');

    expect(toError(error)).toBe(error);
    expect(toError('text').message).toBe('text');
    expect(toError(404).message).toBe('404');
  });

  it('toError는 문자열로 바꿀 수 없는 값도 Error로 만든다', () => {
    const throwing = {
      toString() {
        throw new Error('no string');
      },
    };

    expect(toError(Object.create(null)).message).toBe('[object Object]');
    expect(toError(throwing).message).toBe('[object Object]');
  });

  it('describeError는 빈 메시지를 이름으로 대체한다', () => {
    expect(describeError(new Error('offline'))).toBe('offline');
    expect(describeError(new TypeError(''))).toBe('TypeError');
  });

  it('safeExecute는 예외를 로깅하고 핸들러에 전달한다', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const onError = vi.fn();
    const boundary = new ErrorBoundary('Test', onError);

    boundary.safeExecute(
      () => {
        throw new Error('listener failed');
      },
      { source: 'listener', action: 'fetchCount' },
    );

    expect(consoleError).toHaveBeenCalledWith('[Test] Error in listener for fetchCount:', new Error('listener failed'));
    expect(onError).toHaveBeenCalledWith(new Error('listener failed'), { source: 'listener', action: 'fetchCount' });
  });

  it('핸들러 자체의 예외도 삼킨다', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const boundary = new ErrorBoundary('Test', () => {
      throw new Error('handler failed');
    });

    expect(() =>
      boundary.safeExecute(
        () => {
          throw new Error('first');
        },
        { source: 'onStatusUpdate' },
      ),
    ).not.toThrow();
    expect(consoleError).toHaveBeenLastCalledWith('[Test] Error in error handler:', new Error('handler failed'));
  });
});
