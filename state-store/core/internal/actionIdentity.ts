import { format } from 'date-fns';

/**
 * 분석/로그용 이벤트 정보
 */
export interface ActionEventInfo {
  name: string;
  timeStamp: string;
}

export const ACTION_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss.SSS';

/**
 * 액션 키와 UI 액션 키에 사람이 읽을 수 있는 이름과 시각을 붙입니다.
 */
export interface ActionIdentity<TKey extends PropertyKey> {
  label(key: TKey): string;
  timestamp(date?: Date): string;
  eventInfo(key: TKey, date?: Date): ActionEventInfo;
}

/**
 * 현재(또는 주어진) 시각을 로컬 시간 기준 `yyyy-MM-dd HH:mm:ss.SSS`로 포맷합니다.
 */
export function actionTimestamp(date: Date = new Date()): string {
  return format(date, ACTION_TIMESTAMP_FORMAT);
}

/**
 * 액션 식별자를 생성합니다.
 * @param labels 키 이름 대신 쓸 분석용 이름 (선택)
 *
 * @example
 * const identity = createActionIdentity<FollowersUIAction>({ tappedFollowersButton: 'tapped_followers' });
 * identity.label('tappedFollowersButton'); // 'tapped_followers'
 */
export function createActionIdentity<TKey extends PropertyKey>(
  labels: Partial<Record<TKey, string>> = {},
): ActionIdentity<TKey> {
  const label = (key: TKey): string => labels[key] ?? String(key);

  return {
    label,
    timestamp: actionTimestamp,
    eventInfo: (key, date) => ({
      name: label(key),
      timeStamp: actionTimestamp(date),
    }),
  };
}
