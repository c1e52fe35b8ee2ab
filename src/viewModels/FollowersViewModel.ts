import { delay } from '@fxts/core';
import { createActionTracker } from '../../state-store/core/createActionTracker.ts';
import type { ActionTracker } from '../../state-store/core/internal/ActionTracker.ts';
import { createActionIdentity } from '../../state-store/core/internal/actionIdentity.ts';
import { createActionLogger } from '../../state-store/core/middlewares/createActionLogger.ts';
import type { ActionStateSnapshot } from '../../state-store/core/types/internal/state.ts';
import { describeError } from '../../state-store/utils/errorBoundary.ts';
import type { FollowersActions, FollowersUIAction } from '../actions/followersActions.ts';
import { resolveAppConfig } from '../config.ts';
import type { AppConfig } from '../config.ts';
import { HttpFollowersService } from '../services/followersService.ts';
import type { FollowersService } from '../services/followersService.ts';
import type { Follower } from '../types/index.ts';

export interface FollowersViewModelOptions {
  service?: FollowersService;
  username?: string;
  demoDelayMs?: number;
  /** 액션 시작/종료 로깅 (기본: 개발 모드에서만) */
  logActions?: boolean;
}

export interface FollowersSnapshot {
  followers: readonly Follower[];
  actions: ActionStateSnapshot<FollowersActions>;
  lastErrorMessage: string | null;
}

const actionIdentity = createActionIdentity<keyof FollowersActions>();
const uiActionIdentity = createActionIdentity<FollowersUIAction>();

/**
 * 팔로워 화면 뷰모델
 */
export class FollowersViewModel {
  private readonly tracker: ActionTracker<FollowersActions>;
  private readonly service: FollowersService;
  private readonly username: string;
  private readonly demoDelayMs: number;
  private followerList: readonly Follower[] = [];
  private snapshot: FollowersSnapshot | null = null;

  constructor(options: FollowersViewModelOptions = {}) {
    // 주입되지 않은 옵션이 있을 때만 환경 설정을 읽습니다.
    let config: AppConfig | undefined;
    const getConfig = (): AppConfig => (config ??= resolveAppConfig());

    this.service = options.service ?? new HttpFollowersService({ apiBaseUrl: getConfig().apiBaseUrl });
    this.username = options.username ?? getConfig().username;
    this.demoDelayMs = options.demoDelayMs ?? getConfig().demoDelayMs;

    this.tracker = createActionTracker<FollowersActions>({
      onSuccess: {
        fetchFollowers: (followers, key) => {
          console.log(`[Analytics] Action: ${actionIdentity.label(key)} got success UIs updated at ${actionIdentity.timestamp()}`);
          this.followerList = followers;
        },
      },
      onError: (key, error, recordError) => {
        recordError();
        console.log(`[Analytics] Action: ${actionIdentity.label(key)} got failed UIs updated at ${actionIdentity.timestamp()}`);
        console.warn(`Failed to fetch followers: ${describeError(error)}`);
      },
      onStatusUpdate: createActionLogger<FollowersActions>({
        enabled: options.logActions,
        identity: actionIdentity,
      }),
    });
  }

  get followers(): readonly Follower[] {
    return this.followerList;
  }

  get lastErrorMessage(): string | null {
    return this.tracker.lastErrorMessage;
  }

  isLoading(key: keyof FollowersActions): boolean {
    return this.tracker.isLoading(key);
  }

  errorMessage(key: keyof FollowersActions): string | null {
    return this.tracker.errorMessage(key);
  }

  dismissError(): void {
    this.tracker.clearLastError();
  }

  /**
   * 팔로워 목록을 비동기로 불러옵니다. 결과는 onSuccess 훅에서 반영됩니다.
   */
  fetchFollowers(username: string): void {
    this.tracker.dispatch('fetchFollowers', async () => {
      // 로딩 표시가 보이도록 잠시 기다림
      if (this.demoDelayMs > 0) {
        await delay(this.demoDelayMs);
      }
      return this.service.fetchFollowers(username);
    });
  }

  triggerUIAction(action: FollowersUIAction): void {
    const { name, timeStamp } = uiActionIdentity.eventInfo(action);
    console.log(`User clicked ${name} at ${timeStamp}`);

    switch (action) {
      case 'tappedFollowersButton':
      case 'tappedFollowersRetryButton':
        this.fetchFollowers(this.username);
        break;
    }
  }

  subscribe(listener: () => void): () => void {
    return this.tracker.subscribe(listener);
  }

  /**
   * 화면용 스냅샷. 추적기 상태나 목록이 바뀌기 전까지 같은 객체입니다.
   */
  getSnapshot(): FollowersSnapshot {
    const actions = this.tracker.getSnapshot();
    const lastErrorMessage = this.tracker.lastErrorMessage;
    const cached = this.snapshot;

    if (
      cached &&
      cached.actions === actions &&
      cached.followers === this.followerList &&
      cached.lastErrorMessage === lastErrorMessage
    ) {
      return cached;
    }

    this.snapshot = { followers: this.followerList, actions, lastErrorMessage };
    return this.snapshot;
  }
}
