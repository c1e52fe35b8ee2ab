import type { Follower } from '../types/index.ts';

// 데이터 요청 액션 - 키마다 결과 타입
export type FollowersActions = {
  fetchFollowers: Follower[];
};

// UI 전용 액션 (탭, 이동 등)
export const FOLLOWERS_UI_ACTIONS = ['tappedFollowersButton', 'tappedFollowersRetryButton'] as const;

export type FollowersUIAction = (typeof FOLLOWERS_UI_ACTIONS)[number];
