import { formatSeoulTimestamp } from '../utils/time';

export function formatFailureAlert(sourceId: string, error: string, at: Date): string {
  return [
    '🚨 *스크래퍼 오류 발생*',
    `• 스크래퍼: \`${sourceId}\``,
    `• 오류: ${error}`,
    `• 시간: ${formatSeoulTimestamp(at)} (KST)`,
  ].join('\n');
}
