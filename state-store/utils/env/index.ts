/**
 * 환경 감지 유틸리티
 */

/**
 * 개발 모드인지 확인합니다.
 * @returns 개발 모드면 true, 프로덕션 모드면 false
 */
export const isDevelopment = process.env.NODE_ENV !== 'production';
