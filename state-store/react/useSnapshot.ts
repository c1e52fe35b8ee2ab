import { useSyncExternalStore } from 'react';

/**
 * 구독 가능한 스냅샷 소스 (추적기, 뷰모델)
 */
export interface SnapshotSource<TSnapshot> {
  subscribe(listener: () => void): () => void;
  getSnapshot(): TSnapshot;
}

/**
 * 소스의 스냅샷을 구독하고, 바뀔 때마다 컴포넌트를 다시 렌더링합니다.
 * `getSnapshot`은 변경이 없으면 같은 참조를 돌려줘야 합니다.
 */
export function useSnapshot<TSnapshot>(source: SnapshotSource<TSnapshot>): TSnapshot {
  const subscribe = (listener: () => void) => source.subscribe(listener);
  const getSnapshot = () => source.getSnapshot();
  return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
