/**
 * 액션 맵 타입 - 액션 키와 그 액션이 만들어내는 결과 타입의 대응표
 *
 * @example
 * type FollowersActions = { fetchFollowers: Follower[] };
 */
export type ActionMap = Record<string, unknown>;

/**
 * 디스패치 결과 타입
 * @template T 성공 시 결과 값 타입
 */
export type DispatchResult<T> =
  | {
      success: true;
      value: T;
    }
  | {
      success: false;
      error: Error;
    };

/**
 * 추적 대상 비동기 작업
 * @template T 결과 값 타입
 */
export type ActionWork<T> = () => Promise<T>;

/**
 * 액션 키별 성공 핸들러 - 키마다 결과 타입이 컴파일 시점에 결정됩니다.
 * @template TActions 액션 맵 타입
 */
export type SuccessHandlers<TActions extends ActionMap> = {
  [K in keyof TActions]?: (result: TActions[K], key: K) => void;
};

/**
 * 액션 훅 - 추적기에 주입되는 전략 객체
 * @template TActions 액션 맵 타입
 */
export interface ActionHooks<TActions extends ActionMap> {
  onSuccess?: SuccessHandlers<TActions>;

  /**
   * 실패 시 호출됩니다. 이 훅을 지정하면 기본 동작(에러 메시지 기록)은
   * 자동으로 실행되지 않으므로, 필요하면 `recordError()`를 직접 호출해야 합니다.
   */
  onError?: (key: keyof TActions, error: Error, recordError: () => void) => void;

  onStatusUpdate?: (key: keyof TActions, isLoading: boolean) => void;
}

/**
 * `dispatchGroup`에 넘기는 작업 단위. `ActionTracker.task()`로 만듭니다.
 * @template TActions 액션 맵 타입
 */
export interface ActionTask<TActions extends ActionMap> {
  readonly key: keyof TActions;
  start(onFinished: (result: DispatchResult<unknown>) => void): Promise<DispatchResult<unknown>>;
}

/**
 * 그룹 디스패치 결과 - 완료 순서대로 모인 성공/실패 키 목록
 */
export interface GroupOutcome<TActions extends ActionMap> {
  succeeded: Array<keyof TActions>;
  failed: Array<keyof TActions>;
}
