import type { Follower } from '../types/index.ts';
import { FollowersResponseZ } from '../validation/follower.zod.ts';
import { formatValidationIssues } from '../validation/issues.ts';
import { FollowersServiceError } from './errors.ts';

export const OFFLINE_MESSAGE = 'The Internet connection appears to be offline.';

/**
 * 팔로워 데이터 소스 - 테스트에서는 가짜 구현으로 교체합니다.
 */
export interface FollowersService {
  fetchFollowers(username: string): Promise<Follower[]>;
}

export interface HttpFollowersServiceOptions {
  apiBaseUrl: string;
  fetch?: typeof fetch;
}

/**
 * GitHub REST API에서 팔로워 목록을 가져옵니다.
 */
export class HttpFollowersService implements FollowersService {
  private readonly apiBaseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: HttpFollowersServiceOptions) {
    this.apiBaseUrl = options.apiBaseUrl;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  followersUrl(username: string): string {
    const trimmed = username.trim();
    if (!trimmed) {
      throw new FollowersServiceError('bad-url', `Invalid username: "${username}"`);
    }
    return `${this.apiBaseUrl}/users/${encodeURIComponent(trimmed)}/followers`;
  }

  async fetchFollowers(username: string): Promise<Follower[]> {
    const url = this.followersUrl(username);

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        headers: {
          Accept: 'application/vnd.github+json',
        },
      });
    } catch (error) {
      throw new FollowersServiceError('offline', OFFLINE_MESSAGE, { cause: error });
    }

    if (!res.ok) {
      throw new FollowersServiceError(
        'http',
        `Failed to load followers (${res.status} ${res.statusText}) from ${url}`,
      );
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new FollowersServiceError('decode', 'Followers response is not valid JSON', { cause: error });
    }

    const parsed = FollowersResponseZ.safeParse(json);
    if (!parsed.success) {
      console.warn('[FollowersService] validation errors:', parsed.error.issues);
      throw new FollowersServiceError(
        'decode',
        `Followers response validation failed: ${formatValidationIssues(parsed.error)}`,
      );
    }

    return parsed.data;
  }
}
