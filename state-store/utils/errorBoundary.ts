/**
 * 추적기 훅과 리스너를 위한 오류 경계 유틸리티
 */

/**
 * 오류 컨텍스트
 */
export interface ErrorContext {
  /** 오류가 발생한 훅 또는 콜백 이름 */
  source: string;
  /** 관련된 액션 레이블 */
  action?: string;
}

/**
 * 예외 핸들러 타입 정의
 */
export type ErrorHandler = (error: Error, context: ErrorContext) => void;

/**
 * 알 수 없는 throw 값을 Error로 정규화합니다.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;

  try {
    return new Error(String(value));
  } catch {
    // toString이 없거나 예외를 던지는 값
    return new Error(Object.prototype.toString.call(value));
  }
}

/**
 * 사용자에게 보여줄 에러 설명을 만듭니다. 메시지가 비어 있으면 이름으로 대체합니다.
 */
export function describeError(error: Error): string {
  return error.message || error.name || 'Unknown error';
}

/**
 * 오류 경계 - 콜백에서 발생한 예외를 로깅하고 핸들러에 전달한 뒤 삼킵니다.
 */
export class ErrorBoundary {
  private readonly tag: string;
  private readonly onError?: ErrorHandler;

  constructor(tag: string, onError?: ErrorHandler) {
    this.tag = tag;
    this.onError = onError;
  }

  /**
   * 안전한 함수 실행 래퍼
   * @param fn 실행할 함수
   * @param context 오류 컨텍스트
   */
  safeExecute(fn: () => void, context: ErrorContext): void {
    try {
      fn();
    } catch (thrown) {
      const error = toError(thrown);

      console.error(
        `[${this.tag}] Error in ${context.source}${context.action ? ` for ${context.action}` : ''}:`,
        error,
      );

      if (this.onError) {
        try {
          this.onError(error, context);
        } catch (handlerError) {
          console.error(`[${this.tag}] Error in error handler:`, handlerError);
        }
      }
    }
  }
}
