import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FollowersViewModel } from './FollowersViewModel.ts';
import { FOLLOWERS_UI_ACTIONS } from '../actions/followersActions.ts';
import { FollowersServiceError } from '../services/errors.ts';
import { OFFLINE_MESSAGE } from '../services/followersService.ts';
import type { FollowersService } from '../services/followersService.ts';
import type { Follower } from '../types/index.ts';

class MockFollowersService implements FollowersService {
  shouldFail = false;
  readonly requestedUsers: string[] = [];

  async fetchFollowers(username: string): Promise<Follower[]> {
    this.requestedUsers.push(username);
    if (this.shouldFail) {
      throw new FollowersServiceError('offline', OFFLINE_MESSAGE);
    }
    return [{ id: 1, login: 'mockUser', avatar_url: 'https://example.com/avatar.png' }];
  }
}

function createViewModel(service: FollowersService, demoDelayMs = 0) {
  return new FollowersViewModel({ service, username: 'octocat', demoDelayMs, logActions: false });
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe('FollowersViewModel', () => {
  it('모든 옵션을 주입하면 잘못된 환경 설정을 읽지 않는다', () => {
    vi.stubEnv('FOLLOWERS_DEMO_DELAY_MS', 'not-a-number');
    vi.stubEnv('FOLLOWERS_API_URL', 'not a url');

    expect(() => createViewModel(new MockFollowersService())).not.toThrow();
  });

  it('주입되지 않은 옵션은 환경 설정에서 읽는다', () => {
    vi.stubEnv('FOLLOWERS_DEMO_DELAY_MS', 'not-a-number');

    expect(() => new FollowersViewModel({ service: new MockFollowersService(), logActions: false })).toThrow(
      /^Invalid followers config: /,
    );
  });

  it('fetchFollowers의 시작과 끝을 한 번씩 알린다', async () => {
    const viewModel = createViewModel(new MockFollowersService());
    const loadingEvents: boolean[] = [];
    viewModel.subscribe(() => loadingEvents.push(viewModel.isLoading('fetchFollowers')));

    viewModel.fetchFollowers('anyUser');
    expect(viewModel.isLoading('fetchFollowers')).toBe(true);

    await vi.waitFor(() => expect(viewModel.isLoading('fetchFollowers')).toBe(false));
    expect(loadingEvents).toEqual([true, false]);
  });

  it('성공하면 팔로워 목록을 반영한다', async () => {
    const service = new MockFollowersService();
    const viewModel = createViewModel(service);
    expect(viewModel.isLoading('fetchFollowers')).toBe(false);

    viewModel.fetchFollowers('anyUser');
    await vi.waitFor(() => expect(viewModel.isLoading('fetchFollowers')).toBe(false));

    expect(service.requestedUsers).toEqual(['anyUser']);
    expect(viewModel.errorMessage('fetchFollowers')).toBeNull();
    expect(viewModel.followers).toHaveLength(1);
    expect(viewModel.followers[0].login).toBe('mockUser');
  });

  it('실패하면 에러 메시지를 남기고 목록은 비어 있다', async () => {
    const service = new MockFollowersService();
    service.shouldFail = true;
    const viewModel = createViewModel(service);

    viewModel.fetchFollowers('anyUser');
    await vi.waitFor(() => expect(viewModel.isLoading('fetchFollowers')).toBe(false));

    expect(viewModel.errorMessage('fetchFollowers')).toContain('offline');
    expect(viewModel.followers).toEqual([]);
    expect(viewModel.lastErrorMessage).toBe(OFFLINE_MESSAGE);
    expect(console.warn).toHaveBeenCalledWith(`Failed to fetch followers: ${OFFLINE_MESSAGE}`);

    viewModel.dismissError();
    expect(viewModel.lastErrorMessage).toBeNull();
    expect(viewModel.errorMessage('fetchFollowers')).toBe(OFFLINE_MESSAGE);
  });

  it.each(FOLLOWERS_UI_ACTIONS)('%s는 설정된 사용자의 팔로워를 불러온다', async (action) => {
    const service = new MockFollowersService();
    const viewModel = createViewModel(service);

    viewModel.triggerUIAction(action);
    await vi.waitFor(() => expect(viewModel.isLoading('fetchFollowers')).toBe(false));

    expect(service.requestedUsers).toEqual(['octocat']);
    expect(viewModel.followers).toHaveLength(1);
  });

  it('요청 전에 데모 지연만큼 기다린다', async () => {
    vi.useFakeTimers();
    const service = new MockFollowersService();
    const viewModel = createViewModel(service, 1000);

    viewModel.fetchFollowers('anyUser');
    await vi.advanceTimersByTimeAsync(999);
    expect(service.requestedUsers).toEqual([]);
    expect(viewModel.isLoading('fetchFollowers')).toBe(true);

    await vi.advanceTimersByTimeAsync(1);
    await vi.waitFor(() => expect(viewModel.isLoading('fetchFollowers')).toBe(false));
    expect(service.requestedUsers).toEqual(['anyUser']);
  });

  it('스냅샷은 상태가 바뀔 때만 새 객체가 된다', async () => {
    const viewModel = createViewModel(new MockFollowersService());
    const initial = viewModel.getSnapshot();
    expect(viewModel.getSnapshot()).toBe(initial);
    expect(initial.followers).toEqual([]);

    viewModel.fetchFollowers('anyUser');
    const loading = viewModel.getSnapshot();
    expect(loading).not.toBe(initial);
    expect(loading.actions.get('fetchFollowers')).toEqual({ isLoading: true, errorMessage: null });

    await vi.waitFor(() => expect(viewModel.isLoading('fetchFollowers')).toBe(false));
    const done = viewModel.getSnapshot();
    expect(done.followers).toHaveLength(1);
    expect(viewModel.getSnapshot()).toBe(done);
  });
});
