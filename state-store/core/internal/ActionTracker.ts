import type {
  ActionHooks,
  ActionMap,
  ActionTask,
  ActionWork,
  DispatchResult,
  GroupOutcome,
} from '../types/public-types.ts';
import { IDLE_ACTION_STATE } from '../types/internal/state.ts';
import type { ActionState, ActionStateSnapshot } from '../types/internal/state.ts';
import { ErrorBoundary, describeError, toError } from '../../utils/errorBoundary.ts';
import type { ErrorHandler } from '../../utils/errorBoundary.ts';
import { fx } from '@fxts/core';

/**
 * 추적기 옵션
 */
export interface ActionTrackerOptions {
  /** 훅, onFinished, 리스너에서 발생한 예외를 받을 핸들러 */
  onHookError?: ErrorHandler;
}

/**
 * 액션 추적기 - 이름 붙은 비동기 작업의 로딩/에러 상태를 액션별로 관리합니다.
 *
 * 같은 키를 진행 중에 다시 디스패치하면 마지막 요청이 이깁니다.
 * 이전 요청의 결과는 onFinished에만 전달되고 상태와 훅에는 반영되지 않습니다.
 *
 * @template TActions 액션 맵 타입
 */
export class ActionTracker<TActions extends ActionMap> {
  private readonly stateMap = new Map<keyof TActions, ActionState>();
  private readonly hooks: ActionHooks<TActions>;
  private readonly listeners = new Set<() => void>();
  private readonly errorBoundary: ErrorBoundary;
  // 키별 현재 요청 ID
  private readonly activeRequests = new Map<keyof TActions, number>();
  private nextRequestId = 1;
  private snapshot: ActionStateSnapshot<TActions> | null = null;
  private lastError: string | null = null;

  constructor(hooks: ActionHooks<TActions> = {}, options: ActionTrackerOptions = {}) {
    this.hooks = hooks;
    this.errorBoundary = new ErrorBoundary('ActionTracker', options.onHookError);
  }

  /**
   * 액션의 현재 로딩 여부를 반환합니다. 디스패치된 적이 없으면 false입니다.
   */
  isLoading(key: keyof TActions): boolean {
    return (this.stateMap.get(key) ?? IDLE_ACTION_STATE).isLoading;
  }

  /**
   * 액션의 마지막 에러 메시지를 반환합니다.
   */
  errorMessage(key: keyof TActions): string | null {
    return (this.stateMap.get(key) ?? IDLE_ACTION_STATE).errorMessage;
  }

  /**
   * 가장 최근에 기록된 에러 메시지 (알림 표시용)
   */
  get lastErrorMessage(): string | null {
    return this.lastError;
  }

  clearLastError(): void {
    if (this.lastError === null) return;
    this.lastError = null;
    this.notifyListeners();
  }

  /**
   * 상태 스냅샷을 반환합니다. 상태가 바뀌기 전까지 같은 객체입니다.
   */
  getSnapshot(): ActionStateSnapshot<TActions> {
    if (!this.snapshot) {
      this.snapshot = new Map(this.stateMap);
    }
    return this.snapshot;
  }

  /**
   * 로딩 상태 변경을 구독합니다.
   * @returns 구독 해제 함수
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * 비동기 작업을 디스패치합니다. 호출자를 막지 않으며 예외를 던지지 않습니다.
   * @param key 액션 키
   * @param work 실행할 비동기 작업
   * @param onFinished 완료 시 결과와 함께 호출될 콜백
   */
  dispatch<K extends keyof TActions>(
    key: K,
    work: ActionWork<TActions[K]>,
    onFinished?: (result: DispatchResult<TActions[K]>) => void,
  ): void {
    void this.run(key, work, onFinished);
  }

  /**
   * `dispatch`와 같지만 결과를 Promise로 돌려줍니다. 이 Promise는 reject되지 않습니다.
   */
  run<K extends keyof TActions>(
    key: K,
    work: ActionWork<TActions[K]>,
    onFinished?: (result: DispatchResult<TActions[K]>) => void,
  ): Promise<DispatchResult<TActions[K]>> {
    const requestId = this.nextRequestId++;
    this.activeRequests.set(key, requestId);
    this.setLoading(key, true);

    return this.execute(work).then((result) => {
      this.complete(key, requestId, result, onFinished);
      return result;
    });
  }

  /**
   * 그룹 디스패치용 작업을 만듭니다.
   */
  task<K extends keyof TActions>(key: K, work: ActionWork<TActions[K]>): ActionTask<TActions> {
    return {
      key,
      start: (onFinished) => this.run(key, work, onFinished),
    };
  }

  /**
   * 여러 작업을 동시에 디스패치하고, 모두 끝나면 성공/실패 키 목록으로 한 번 콜백합니다.
   */
  dispatchGroup(
    tasks: ReadonlyArray<ActionTask<TActions>>,
    onFinishedAll: (succeeded: Array<keyof TActions>, failed: Array<keyof TActions>) => void,
  ): void {
    void this.runGroup(tasks).then(({ succeeded, failed }) => {
      this.errorBoundary.safeExecute(() => onFinishedAll(succeeded, failed), { source: 'onFinishedAll' });
    });
  }

  /**
   * `dispatchGroup`과 같지만 결과를 Promise로 돌려줍니다.
   */
  async runGroup(tasks: ReadonlyArray<ActionTask<TActions>>): Promise<GroupOutcome<TActions>> {
    const outcome: GroupOutcome<TActions> = { succeeded: [], failed: [] };
    if (tasks.length === 0) {
      return outcome;
    }

    // 모든 작업을 동기적으로 시작해 로딩 상태가 즉시 반영되게 합니다.
    // 완료 콜백은 모두 같은 이벤트 루프에서 실행되므로 목록 갱신이 섞이지 않습니다.
    const running = fx(tasks)
      .map((task) =>
        task.start((result) => {
          (result.success ? outcome.succeeded : outcome.failed).push(task.key);
        }),
      )
      .toArray();

    await Promise.all(running);
    return outcome;
  }

  private async execute<T>(work: ActionWork<T>): Promise<DispatchResult<T>> {
    // 작업은 호출자의 동기 흐름이 끝난 뒤 시작합니다.
    await Promise.resolve();

    try {
      const value = await work();
      return { success: true, value };
    } catch (error) {
      return { success: false, error: toError(error) };
    }
  }

  private complete<K extends keyof TActions>(
    key: K,
    requestId: number,
    result: DispatchResult<TActions[K]>,
    onFinished?: (result: DispatchResult<TActions[K]>) => void,
  ): void {
    const label = String(key);
    const isCurrent = this.activeRequests.get(key) === requestId;

    if (!isCurrent) {
      console.debug(`[ActionTracker] Ignoring outdated result for ${label}`);
    } else if (result.success) {
      const handler = this.hooks.onSuccess?.[key];
      if (handler) {
        const value = result.value;
        this.errorBoundary.safeExecute(() => handler(value, key), { source: 'onSuccess', action: label });
      }
    } else {
      this.handleError(key, result.error);
    }

    if (onFinished) {
      this.errorBoundary.safeExecute(() => onFinished(result), { source: 'onFinished', action: label });
    }

    if (isCurrent) {
      this.activeRequests.delete(key);
      this.setLoading(key, false);
    }
  }

  private handleError(key: keyof TActions, error: Error): void {
    const recordError = () => this.recordError(key, error);
    const { onError } = this.hooks;

    if (onError) {
      this.errorBoundary.safeExecute(() => onError(key, error, recordError), {
        source: 'onError',
        action: String(key),
      });
    } else {
      recordError();
    }
  }

  private recordError(key: keyof TActions, error: Error): void {
    const message = describeError(error);
    this.updateState(key, { errorMessage: message });
    this.lastError = message;
  }

  private setLoading(key: keyof TActions, isLoading: boolean): void {
    // 새 디스패치는 이전 에러를 지웁니다.
    this.updateState(key, isLoading ? { isLoading, errorMessage: null } : { isLoading });

    const { onStatusUpdate } = this.hooks;
    if (onStatusUpdate) {
      this.errorBoundary.safeExecute(() => onStatusUpdate(key, isLoading), {
        source: 'onStatusUpdate',
        action: String(key),
      });
    }

    this.notifyListeners();
  }

  private updateState(key: keyof TActions, patch: Partial<ActionState>): void {
    this.stateMap.set(key, { ...(this.stateMap.get(key) ?? IDLE_ACTION_STATE), ...patch });
    this.snapshot = null;
  }

  /**
   * 모든 리스너에게 상태 변경을 알립니다.
   */
  private notifyListeners(): void {
    fx(this.listeners).each((listener) => {
      this.errorBoundary.safeExecute(listener, { source: 'listener' });
    });
  }
}
