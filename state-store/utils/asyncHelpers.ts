import type { DispatchResult } from '../core/types/public-types.ts';
import type { ActionState, ActionStatus } from '../core/types/internal/state.ts';

/**
 * 디스패치 결과를 unwrap하는 유틸리티 함수입니다.
 * 성공 시 결과를 반환하고, 실패 시 예외를 발생시킵니다.
 *
 * @throws 실패 시 에러를 throw
 */
export async function unwrap<T>(dispatched: Promise<DispatchResult<T>>): Promise<T> {
  const result = await dispatched;
  if (result.success) {
    return result.value;
  }
  throw result.error;
}

/**
 * 액션 상태를 사용하기 쉬운 형태로 변환합니다.
 *
 * @param state 액션 상태 (디스패치된 적이 없으면 undefined)
 * @returns 로딩/에러/성공이 서로 배타적인 상태 정보
 */
export function getActionStatus(state: ActionState | undefined) {
  const status: ActionStatus = !state
    ? 'idle'
    : state.isLoading
      ? 'loading'
      : state.errorMessage !== null
        ? 'failed'
        : 'succeeded';

  return {
    status,
    isLoading: status === 'loading',
    isError: status === 'failed',
    isSuccess: status === 'succeeded',
    errorMessage: state && status === 'failed' ? state.errorMessage : null,
  };
}
