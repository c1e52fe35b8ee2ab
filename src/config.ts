import { z } from 'zod';
import { formatValidationIssues } from './validation/issues.ts';

const AppConfigZ = z.object({
  FOLLOWERS_API_URL: z
    .string()
    .url()
    .default('https://api.github.com')
    .transform((url) => url.replace(/\/+$/, '')),
  FOLLOWERS_USERNAME: z.string().min(1).default('apple'),
  FOLLOWERS_DEMO_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
});

export interface AppConfig {
  /** REST API 루트 (끝의 `/` 제거됨) */
  apiBaseUrl: string;
  /** 버튼으로 불러올 사용자 */
  username: string;
  /** 로딩 표시를 보여주기 위해 요청 전에 기다리는 시간(ms) */
  demoDelayMs: number;
}

/**
 * 환경 변수에서 앱 설정을 읽습니다.
 * @throws 값이 잘못되면 zod 이슈 목록과 함께 에러
 */
export function resolveAppConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = AppConfigZ.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid followers config: ${formatValidationIssues(parsed.error)}`);
  }

  return {
    apiBaseUrl: parsed.data.FOLLOWERS_API_URL,
    username: parsed.data.FOLLOWERS_USERNAME,
    demoDelayMs: parsed.data.FOLLOWERS_DEMO_DELAY_MS,
  };
}
