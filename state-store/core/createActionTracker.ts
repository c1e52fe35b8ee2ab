import { ActionTracker } from './internal/ActionTracker.ts';
import type { ActionTrackerOptions } from './internal/ActionTracker.ts';
import type { ActionHooks, ActionMap } from './types/public-types.ts';

/**
 * 액션 추적기를 생성합니다.
 * @template TActions 액션 키와 결과 타입의 대응표
 *
 * @warning 추적기는 뷰모델 하나가 소유해야 합니다.
 * 모듈 전역에 하나만 두고 여러 화면이 공유하면 같은 키의 로딩/에러 상태가 화면 사이에 섞입니다.
 *
 * @example
 * type ProfileActions = { fetchProfile: Profile; fetchPosts: Post[] };
 *
 * const tracker = createActionTracker<ProfileActions>({
 *   onSuccess: {
 *     fetchProfile: (profile) => { state.profile = profile; },
 *     fetchPosts: (posts) => { state.posts = posts; },
 *   },
 * });
 *
 * tracker.dispatch('fetchProfile', () => api.getProfile(id));
 * tracker.isLoading('fetchProfile'); // true
 */
export function createActionTracker<TActions extends ActionMap>(
  hooks: ActionHooks<TActions> = {},
  options: ActionTrackerOptions = {},
): ActionTracker<TActions> {
  return new ActionTracker<TActions>(hooks, options);
}
