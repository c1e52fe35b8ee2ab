export type FollowersServiceErrorKind = 'bad-url' | 'offline' | 'http' | 'decode';

/**
 * 팔로워 서비스 오류 - 추적기에는 메시지만 전달되고, kind는 호출자가 분기할 때 씁니다.
 */
export class FollowersServiceError extends Error {
  readonly kind: FollowersServiceErrorKind;

  constructor(kind: FollowersServiceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FollowersServiceError';
    this.kind = kind;
  }
}
