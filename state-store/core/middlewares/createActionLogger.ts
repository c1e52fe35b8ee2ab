import type { ActionHooks, ActionMap } from '../types/public-types.ts';
import { createActionIdentity } from '../internal/actionIdentity.ts';
import type { ActionIdentity } from '../internal/actionIdentity.ts';
import { isDevelopment } from '../../utils/env/index.ts';

type StatusHook<TActions extends ActionMap> = NonNullable<ActionHooks<TActions>['onStatusUpdate']>;

export interface ActionLoggerOptions<TActions extends ActionMap> {
  /** 로깅 여부 (기본: 개발 모드에서만 true) */
  enabled?: boolean;
  identity?: ActionIdentity<keyof TActions>;
  log?: (message: string) => void;
}

/**
 * 콘솔 로거 상태 훅을 생성합니다.
 * 액션의 시작과 종료 시각, 실행 시간을 콘솔에 로깅합니다.
 *
 * @template TActions 액션 맵 타입
 * @returns `onStatusUpdate`로 쓸 수 있는 훅
 */
export function createActionLogger<TActions extends ActionMap>(
  options: ActionLoggerOptions<TActions> = {},
): StatusHook<TActions> {
  const {
    enabled = isDevelopment,
    identity = createActionIdentity<keyof TActions>(),
    log = (message: string) => console.log(message),
  } = options;
  const startTimes = new Map<keyof TActions, number>();

  return (key, isLoading) => {
    if (!enabled) return;

    const { name, timeStamp } = identity.eventInfo(key);

    if (isLoading) {
      startTimes.set(key, performance.now());
      log(`[ActionTracker] ${name} started at ${timeStamp}`);
      return;
    }

    const startTime = startTimes.get(key);
    startTimes.delete(key);
    const executionTime = startTime === undefined ? '' : ` (${(performance.now() - startTime).toFixed(2)}ms)`;
    log(`[ActionTracker] ${name} ended at ${timeStamp}${executionTime}`);
  };
}
