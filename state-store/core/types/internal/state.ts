import type { ActionMap } from '../public-types.ts';

/**
 * 액션별 추적 상태
 */
export interface ActionState {
  readonly isLoading: boolean;
  readonly errorMessage: string | null;
}

/**
 * 액션 상태를 읽기 쉬운 단계로 나타낸 값
 */
export type ActionStatus = 'idle' | 'loading' | 'succeeded' | 'failed';

/**
 * 한 번도 디스패치되지 않은 액션의 상태
 */
export const IDLE_ACTION_STATE: ActionState = Object.freeze({
  isLoading: false,
  errorMessage: null,
});

/**
 * 추적기 상태 스냅샷 - 다음 변경 전까지 같은 참조를 유지합니다.
 * @template TActions 액션 맵 타입
 */
export type ActionStateSnapshot<TActions extends ActionMap> = ReadonlyMap<keyof TActions, ActionState>;
